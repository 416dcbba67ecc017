import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { ChatRequestSchema, type ChatRequest } from './chat.schemas';
import { ChatService } from './chat.service';

@Controller('api/chat')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post()
  @HttpCode(200)
  async ask(@Body(new ZodValidationPipe(ChatRequestSchema)) body: ChatRequest) {
    return this.chat.ask(body);
  }
}
