import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ConverseCommandOutput,
} from '@aws-sdk/client-bedrock-runtime';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { LlmUnavailableError } from '../common/errors';
import type { LlmClient } from '../chat/llm-client';

@Injectable()
export class BedrockService implements LlmClient {
  private readonly logger = new Logger(BedrockService.name);
  private readonly client: BedrockRuntimeClient | null;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    const { region } = config.llm;
    // No retries: a failed call goes straight back to the user.
    this.client = region
      ? new BedrockRuntimeClient({ region, maxAttempts: 1 })
      : null;
    if (!region) {
      this.logger.warn('No AWS region configured; chat is disabled');
    }
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    if (!this.client) {
      throw new LlmUnavailableError(
        'The assistant is not configured (AWS_REGION missing)',
      );
    }

    const cmd = new ConverseCommand({
      modelId: this.config.llm.model,
      messages: [
        {
          role: 'user',
          content: [{ text: prompt }],
        },
      ],
      inferenceConfig: {
        maxTokens: this.config.llm.maxTokens,
        temperature: 0.2,
      },
    });

    const res = await this.client.send(cmd, { abortSignal: signal });
    const stop = res.stopReason ?? 'n/a';
    const tokens = res.usage?.totalTokens ?? '?';
    this.logger.debug(
      `Bedrock ${this.config.llm.model} stop=${stop} tokens=${tokens}`,
    );
    return extractText(res);
  }
}

export function extractText(
  res: Pick<ConverseCommandOutput, 'output'>,
): string {
  const blocks = res.output?.message?.content ?? [];
  return blocks
    .map((b) => b.text)
    .filter((t): t is string => typeof t === 'string')
    .join('');
}
