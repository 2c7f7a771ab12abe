import { Module } from '@nestjs/common';
import { CvModule } from '@deskpilot/cv';
import { NutModule } from '@deskpilot/input';
import { PlannerModule } from '../planner/planner.module';
import { ExecutorModule } from '../executor/executor.module';
import { ArtifactsModule } from '../artifacts/artifacts.module';
import { AgentLoopService } from './agent-loop.service';

@Module({
  imports: [
    CvModule.register({ imports: [NutModule] }),
    PlannerModule,
    ExecutorModule,
    ArtifactsModule,
  ],
  providers: [AgentLoopService],
  exports: [AgentLoopService],
})
export class AgentModule {}
