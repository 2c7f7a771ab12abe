import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic, { APIUserAbortError } from '@anthropic-ai/sdk';
import {
  DeskpilotEnv,
  PlannerUnavailableError,
  errorMessage,
} from '@deskpilot/shared';
import { DEFAULT_MODELS } from './llm.constants';
import { CompletionOptions, LanguageModelService } from './llm.types';

@Injectable()
export class AnthropicService implements LanguageModelService {
  readonly provider = 'anthropic';
  private anthropic: Anthropic | null = null;
  private currentApiKey: string | null = null;
  private hasLoggedMissingKey = false;
  private readonly logger = new Logger(AnthropicService.name);

  constructor(
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  async complete(
    prompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const client = this.getAnthropicClient();
    const model =
      this.configService.get('LLM_MODEL', { infer: true }) ??
      DEFAULT_MODELS.anthropic;

    try {
      const response = await client.messages.create(
        {
          model,
          max_tokens: this.configService.get('LLM_MAX_TOKENS', { infer: true }),
          ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal },
      );

      return response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
    } catch (error) {
      if (error instanceof APIUserAbortError) {
        this.logger.log('Anthropic API call aborted');
        throw new PlannerUnavailableError('aborted', { cause: error });
      }
      this.logger.error(
        `Error sending message to Anthropic: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new PlannerUnavailableError(
        `Anthropic request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private getAnthropicClient(): Anthropic {
    const apiKey = this.configService.get('ANTHROPIC_API_KEY', { infer: true });

    if (!apiKey) {
      this.logMissingKey();
      throw new PlannerUnavailableError('ANTHROPIC_API_KEY is not configured');
    }

    if (!this.anthropic || apiKey !== this.currentApiKey) {
      this.anthropic = new Anthropic({ apiKey });
      this.currentApiKey = apiKey;
      this.hasLoggedMissingKey = false;
    }
    return this.anthropic;
  }

  private logMissingKey(): void {
    if (!this.hasLoggedMissingKey) {
      this.logger.warn(
        'ANTHROPIC_API_KEY is not configured. Anthropic requests will fail until it is set.',
      );
      this.hasLoggedMissingKey = true;
    }
  }
}
