import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import { DeskpilotEnv } from '@deskpilot/shared';
import { createWinstonLogger } from './winston-logger.service';

@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<DeskpilotEnv, true>) => ({
        instance: createWinstonLogger({
          logDir: configService.get('LOG_DIR', { infer: true }),
          level: configService.get('LOG_LEVEL', { infer: true }),
        }),
      }),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
