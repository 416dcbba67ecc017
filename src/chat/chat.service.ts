import { Injectable } from '@nestjs/common';
import { ChatOrchestrator } from './chat-orchestrator.service';
import type { ChatExchange, ChatRequest } from './chat.schemas';
import { ContextBuilder } from './context-builder.service';

@Injectable()
export class ChatService {
  constructor(
    private readonly contextBuilder: ContextBuilder,
    private readonly orchestrator: ChatOrchestrator,
  ) {}

  async ask({ question, code }: ChatRequest): Promise<ChatExchange> {
    const context = await this.contextBuilder.build(question, code);
    const answer = await this.orchestrator.answer(question, context);

    return {
      question,
      code: context.code ?? null,
      mode: context.mode,
      answer,
      answeredAt: new Date().toISOString(),
    };
  }
}
