import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DeskpilotEnv } from '@deskpilot/shared';
import { STEP_ARTIFACT_SINK, StepArtifactSink } from './artifact-sink.types';
import { FileArtifactSink } from './file-artifact-sink';
import { NoopArtifactSink } from './noop-artifact-sink';

@Module({
  providers: [
    {
      provide: STEP_ARTIFACT_SINK,
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<DeskpilotEnv, true>,
      ): StepArtifactSink =>
        configService.get('RUN_ARTIFACTS_ENABLED', { infer: true })
          ? new FileArtifactSink(configService)
          : new NoopArtifactSink(),
    },
  ],
  exports: [STEP_ARTIFACT_SINK],
})
export class ArtifactsModule {}
