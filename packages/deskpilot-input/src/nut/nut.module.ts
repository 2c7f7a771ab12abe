import { Module } from '@nestjs/common';
import { INPUT_CONTROLLER, SCREEN_CAPTURE } from '@deskpilot/shared';
import { NutService } from './nut.service';

@Module({
  providers: [
    NutService,
    { provide: INPUT_CONTROLLER, useExisting: NutService },
    { provide: SCREEN_CAPTURE, useExisting: NutService },
  ],
  exports: [NutService, INPUT_CONTROLLER, SCREEN_CAPTURE],
})
export class NutModule {}
