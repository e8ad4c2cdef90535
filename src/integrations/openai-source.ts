import { CandidateSource, ChatMessage, EmotionSignal, SourceParams, SourceReply } from '../types';
import { emotionSignalSchema } from '../utils/schemas';
import { OpenAIService } from './openai';

export interface OpenAISourceOptions {
  name: string;
  family: string;
  model: string;
  modes?: string[];
  enabled?: boolean;
  temperature?: number;
  maxTokens?: number;
}

// Tone hint only; numbers must never be echoed back to the user
export function emotionStyleMessage(signal: EmotionSignal): ChatMessage {
  return {
    role: 'system',
    content: [
      `Current emotional tone (mode: ${signal.mode}):`,
      `affection ${signal.affection.toFixed(2)}, arousal ${signal.arousal.toFixed(2)}, ` +
        `tension ${signal.tension.toFixed(2)}, anger ${signal.anger.toFixed(2)}, ` +
        `sadness ${signal.sadness.toFixed(2)}, excitement ${signal.excitement.toFixed(2)}.`,
      'Let this shape only wording, warmth and distance. Never mention these values.'
    ].join('\n')
  };
}

function numberParam(params: SourceParams, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function stringParam(params: SourceParams, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createOpenAISource(service: OpenAIService, options: OpenAISourceOptions): CandidateSource {
  return {
    name: options.name,
    family: options.family,
    modes: options.modes ?? ['all'],
    enabled: options.enabled ?? true,

    async call(messages: ChatMessage[], params: SourceParams, signal: AbortSignal): Promise<SourceReply> {
      const emotion = emotionSignalSchema.safeParse(params.emotion);
      const prompt = emotion.success ? [emotionStyleMessage(emotion.data), ...messages] : messages;

      const result = await service.complete({
        messages: prompt,
        model: stringParam(params, 'model') ?? options.model,
        temperature: numberParam(params, 'temperature') ?? options.temperature,
        maxTokens: numberParam(params, 'max_tokens') ?? options.maxTokens,
        signal
      });
      return [result.text, result.usage];
    }
  };
}
