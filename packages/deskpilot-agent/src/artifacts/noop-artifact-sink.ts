import { Injectable } from '@nestjs/common';
import { StepArtifactSink } from './artifact-sink.types';

@Injectable()
export class NoopArtifactSink implements StepArtifactSink {
  async startRun(): Promise<undefined> {
    return undefined;
  }

  async recordStep(): Promise<void> {}

  async finishRun(): Promise<void> {}
}
