import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DeskpilotEnv } from '@deskpilot/shared';
import { AnthropicService } from './anthropic.service';
import { OpenAIService } from './openai.service';
import { GoogleService } from './google.service';
import { LANGUAGE_MODEL, LanguageModelService } from './llm.types';

@Module({
  providers: [
    AnthropicService,
    OpenAIService,
    GoogleService,
    {
      provide: LANGUAGE_MODEL,
      inject: [ConfigService, AnthropicService, OpenAIService, GoogleService],
      useFactory: (
        configService: ConfigService<DeskpilotEnv, true>,
        anthropic: AnthropicService,
        openai: OpenAIService,
        google: GoogleService,
      ): LanguageModelService => {
        switch (configService.get('LLM_PROVIDER', { infer: true })) {
          case 'openai':
            return openai;
          case 'google':
            return google;
          case 'anthropic':
            return anthropic;
        }
      },
    },
  ],
  exports: [LANGUAGE_MODEL],
})
export class LlmModule {}
