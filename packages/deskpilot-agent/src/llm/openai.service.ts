import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI, { APIUserAbortError } from 'openai';
import {
  DeskpilotEnv,
  PlannerUnavailableError,
  errorMessage,
} from '@deskpilot/shared';
import { DEFAULT_MODELS } from './llm.constants';
import { CompletionOptions, LanguageModelService } from './llm.types';

@Injectable()
export class OpenAIService implements LanguageModelService {
  readonly provider = 'openai';
  private openai: OpenAI | null = null;
  private currentApiKey: string | null = null;
  private hasLoggedMissingKey = false;
  private readonly logger = new Logger(OpenAIService.name);

  constructor(
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  async complete(
    prompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const client = this.getOpenAIClient();
    const model =
      this.configService.get('LLM_MODEL', { infer: true }) ??
      DEFAULT_MODELS.openai;

    try {
      const response = await client.responses.create(
        {
          model,
          max_output_tokens: this.configService.get('LLM_MAX_TOKENS', {
            infer: true,
          }),
          input: prompt,
          instructions: options.systemPrompt,
          store: false,
        },
        { signal: options.signal },
      );
      return response.output_text;
    } catch (error) {
      if (error instanceof APIUserAbortError) {
        this.logger.log('OpenAI API call aborted');
        throw new PlannerUnavailableError('aborted', { cause: error });
      }
      this.logger.error(
        `Error sending message to OpenAI: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new PlannerUnavailableError(
        `OpenAI request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private getOpenAIClient(): OpenAI {
    const apiKey = this.configService.get('OPENAI_API_KEY', { infer: true });

    if (!apiKey) {
      if (!this.hasLoggedMissingKey) {
        this.logger.warn(
          'OPENAI_API_KEY is not configured. OpenAI requests will fail until it is set.',
        );
        this.hasLoggedMissingKey = true;
      }
      throw new PlannerUnavailableError('OPENAI_API_KEY is not configured');
    }

    if (!this.openai || apiKey !== this.currentApiKey) {
      this.openai = new OpenAI({ apiKey });
      this.currentApiKey = apiKey;
      this.hasLoggedMissingKey = false;
    }
    return this.openai;
  }
}
