import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import {
  DeskpilotEnv,
  PlannerUnavailableError,
  errorMessage,
} from '@deskpilot/shared';
import { DEFAULT_MODELS } from './llm.constants';
import { CompletionOptions, LanguageModelService } from './llm.types';

@Injectable()
export class GoogleService implements LanguageModelService {
  readonly provider = 'google';
  private google: GoogleGenAI | null = null;
  private currentApiKey: string | null = null;
  private hasLoggedMissingKey = false;
  private readonly logger = new Logger(GoogleService.name);

  constructor(
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  async complete(
    prompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const client = this.getGoogleClient();
    const model =
      this.configService.get('LLM_MODEL', { infer: true }) ??
      DEFAULT_MODELS.google;

    try {
      const response = await client.models.generateContent({
        model,
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        config: {
          maxOutputTokens: this.configService.get('LLM_MAX_TOKENS', {
            infer: true,
          }),
          systemInstruction: options.systemPrompt,
          abortSignal: options.signal,
        },
      });
      return response.text ?? '';
    } catch (error) {
      // The SDK surfaces aborts as plain errors
      if (options.signal?.aborted) {
        this.logger.log('Google Gemini API call aborted');
        throw new PlannerUnavailableError('aborted', { cause: error });
      }
      this.logger.error(
        `Error sending message to Google Gemini: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new PlannerUnavailableError(
        `Google Gemini request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private getGoogleClient(): GoogleGenAI {
    const apiKey = this.configService.get('GEMINI_API_KEY', { infer: true });

    if (!apiKey) {
      if (!this.hasLoggedMissingKey) {
        this.logger.warn(
          'GEMINI_API_KEY is not configured. Google requests will fail until it is set.',
        );
        this.hasLoggedMissingKey = true;
      }
      throw new PlannerUnavailableError('GEMINI_API_KEY is not configured');
    }

    if (!this.google || apiKey !== this.currentApiKey) {
      this.google = new GoogleGenAI({ apiKey });
      this.currentApiKey = apiKey;
      this.hasLoggedMissingKey = false;
    }
    return this.google;
  }
}
