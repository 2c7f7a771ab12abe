import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { PlannerService } from './planner.service';

@Module({
  imports: [LlmModule],
  providers: [PlannerService],
  exports: [PlannerService],
})
export class PlannerModule {}
