import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { OmniParserClientService } from '@deskpilot/cv';
import { errorMessage } from '@deskpilot/shared';
import { AppModule } from './app.module';
import { AgentLoopService } from './agent/agent-loop.service';
import { AgentRunFailedError } from './agent/agent.types';
import { RunCommandDto, USAGE, parseRunCommand } from './cli/run-command.dto';
import { EXIT_CODES, formatRunReport } from './cli/run-report';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  let command: RunCommandDto;
  try {
    command = parseRunCommand(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n${USAGE}\n`);
    process.exitCode = EXIT_CODES.failed;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  if (!(await app.get(OmniParserClientService).isAvailable())) {
    logger.warn(
      'OmniParser is not reachable; perception will fail until it is available',
    );
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupt received, stopping before the next step');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await app.get(AgentLoopService).run(command.goal, {
      maxSteps: command.maxSteps,
      signal: controller.signal,
    });
    process.stdout.write(`${formatRunReport(report)}\n`);
    process.exitCode = EXIT_CODES[report.outcome];
  } catch (error) {
    if (!(error instanceof AgentRunFailedError)) {
      throw error;
    }
    process.stdout.write(`${formatRunReport(error.report)}\n`);
    process.exitCode = EXIT_CODES.failed;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'deskpilot failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = EXIT_CODES.failed;
});
