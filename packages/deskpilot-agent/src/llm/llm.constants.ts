import { LlmProvider } from './llm.types';

/**
 * Models used when LLM_MODEL is unset. All of them accept the planner's
 * text-only prompt; vision support is not required.
 */
export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: 'claude-3-5-sonnet-20241022',
  openai: 'gpt-4o',
  google: 'gemini-2.5-flash',
};

