import { CandidateSource, ChatMessage, SourceParams, SourceReply } from '../types';

export interface ScriptedSourceOptions {
  name: string;
  family?: string;
  modes?: string[];
  enabled?: boolean;
  // Each entry is a reply, or an Error to raise on that call
  replies: Array<string | Error>;
  delayMs?: number;
}

/**
 * Offline source that plays back fixed replies in order, cycling at the end.
 * Used by the demo when no API key is configured.
 */
export function createScriptedSource(options: ScriptedSourceOptions): CandidateSource {
  let cursor = 0;

  return {
    name: options.name,
    family: options.family ?? options.name,
    modes: options.modes ?? ['all'],
    enabled: options.enabled ?? true,

    async call(_messages: ChatMessage[], _params: SourceParams, signal: AbortSignal): Promise<SourceReply> {
      if (options.replies.length === 0) {
        throw new Error(`Scripted source "${options.name}" has no replies`);
      }

      const reply = options.replies[cursor % options.replies.length];
      cursor++;

      if (options.delayMs) {
        await new Promise<void>((resolve, reject) => {
          const timer = setTimeout(resolve, options.delayMs);
          signal.addEventListener(
            'abort',
            () => {
              clearTimeout(timer);
              reject(new Error(`Scripted source "${options.name}" aborted`));
            },
            { once: true }
          );
        });
      }

      if (reply instanceof Error) throw reply;
      return [reply, { total_tokens: reply.length }];
    }
  };
}
