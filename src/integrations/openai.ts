import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatMessage, UsageMetadata } from '../types';
import { CompanionError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';

export interface OpenAIConfig {
  replyModel: string;
  analysisModel: string;
  refineModel: string;
}

export const DEFAULT_OPENAI_CONFIG: OpenAIConfig = {
  replyModel: 'gpt-4o',
  analysisModel: 'gpt-4o-mini',
  refineModel: 'gpt-4o'
};

export interface CompletionRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  usage: UsageMetadata | null;
}

export class OpenAIService {
  private client: OpenAI;
  private config: OpenAIConfig;
  private logger: Logger;

  constructor(apiKey: string, config: OpenAIConfig = DEFAULT_OPENAI_CONFIG) {
    // Retries are the source's business; the collector never retries
    this.client = new OpenAI({ apiKey, maxRetries: 1 });
    this.config = config;
    this.logger = createLogger('openai');
  }

  get models(): OpenAIConfig {
    return { ...this.config };
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const model = request.model ?? this.config.replyModel;
    try {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages: request.messages.map(toOpenAIMessage),
          temperature: request.temperature ?? 0.8,
          max_tokens: request.maxTokens ?? 900,
          ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {})
        },
        { signal: request.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content || content.trim().length === 0) {
        throw new CompanionError('empty_response', `No content received from OpenAI (${model})`);
      }

      const usage = response.usage
        ? {
            prompt_tokens: response.usage.prompt_tokens,
            completion_tokens: response.usage.completion_tokens,
            total_tokens: response.usage.total_tokens
          }
        : null;

      return { text: content.trim(), usage };
    } catch (error) {
      this.logger.error({ err: error, model }, 'Error generating completion');
      throw error;
    }
  }
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
