import { DeskpilotEnv } from '@deskpilot/shared';

export type LlmProvider = DeskpilotEnv['LLM_PROVIDER'];

export interface CompletionOptions {
  systemPrompt?: string;
  signal?: AbortSignal;
}

/**
 * A text-in, text-out language model. Implementations throw
 * PlannerUnavailableError when the call cannot be made or is aborted.
 */
export interface LanguageModelService {
  readonly provider: LlmProvider;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export const LANGUAGE_MODEL = 'LANGUAGE_MODEL';
