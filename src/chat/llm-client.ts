export const LLM_CLIENT = Symbol('LLM_CLIENT');

/** Single-turn text completion. Resolves the model's text, possibly empty. */
export interface LlmClient {
  complete(prompt: string, signal: AbortSignal): Promise<string>;
}
