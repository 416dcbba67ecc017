import { Inject, Injectable, Logger } from '@nestjs/common';
import { PromptTemplate } from '@langchain/core/prompts';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import {
  AppError,
  LlmTimeoutError,
  LlmUnavailableError,
  errorMessage,
} from '../common/errors';
import type { ChatContext } from './context-builder.service';
import { LLM_CLIENT, type LlmClient } from './llm-client';

export const NO_ANSWER_MESSAGE =
  'Sorry, no answer is available right now. ' +
  'Please try rephrasing your question.';

function isTimeout(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

/**
 * Sends one prompt per question to the LLM. No retries: a failure surfaces to
 * the caller as {@link LlmTimeoutError} or {@link LlmUnavailableError}.
 */
@Injectable()
export class ChatOrchestrator {
  private readonly logger = new Logger(ChatOrchestrator.name);

  constructor(
    @Inject(LLM_CLIENT) private readonly llm: LlmClient,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  // NOTE: braces are PromptTemplate placeholders; keep literal braces out.
  private prompt() {
    return new PromptTemplate({
      template: `
You are a virtual assistant that answers questions about public-sector
contract records extracted from the national procurement portal.

Rules:
- Use ONLY the data in CONTEXT. If it does not answer the question, say so.
- A value shown as "missing" was not extracted; never invent it.
- Be clear, professional and concise. Reply in {language}.

CONTEXT:
<<<{context}>>>

User question:
<<<{question}>>>
`,
      inputVariables: ['language', 'context', 'question'],
    });
  }

  async renderPrompt(question: string, context: ChatContext): Promise<string> {
    return this.prompt().format({
      language: this.config.llm.replyLanguage,
      context: context.text,
      question,
    });
  }

  async answer(question: string, context: ChatContext): Promise<string> {
    const prompt = await this.renderPrompt(question, context);

    const controller = new AbortController();
    const { timeoutMs } = this.config.llm;
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const started = Date.now();

    let reply: string;
    try {
      this.logger.debug(
        `Sending ${context.mode} prompt (${prompt.length} chars)`,
      );
      reply = await this.llm.complete(prompt, controller.signal);
    } catch (err) {
      const elapsed = Date.now() - started;
      if (controller.signal.aborted || isTimeout(err)) {
        this.logger.warn(`LLM timed out after ${elapsed}ms`);
        throw new LlmTimeoutError(
          `The assistant did not answer within ${timeoutMs}ms`,
          { cause: err },
        );
      }
      const message = errorMessage(err);
      this.logger.error(`LLM call failed after ${elapsed}ms: ${message}`);
      if (err instanceof AppError) throw err;
      throw new LlmUnavailableError(
        `The assistant is unavailable: ${message}`,
        { cause: err },
      );
    } finally {
      clearTimeout(timer);
    }

    const elapsed = Date.now() - started;
    this.logger.log(`Answered ${context.mode} question in ${elapsed}ms`);
    return reply.trim() === '' ? NO_ANSWER_MESSAGE : reply;
  }
}
