import { Candidate, CandidateSource, ChatMessage, RandomSource, SourceParams, SourceReply } from '../types';

export const okCandidate = (source_name: string, text: string): Candidate => ({
  source_name,
  status: 'ok',
  text,
  usage: null
});

export const errorCandidate = (source_name: string, message = 'Error: boom'): Candidate => ({
  source_name,
  status: 'error',
  text: '',
  usage: null,
  error_code: 'source_call_failed',
  error_message: message
});

// Plays the given values in order, then repeats the last one
export function sequence(...values: number[]): RandomSource {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)];
}

export const fixedRandom = (value: number): RandomSource => () => value;

export interface RecordedCall {
  messages: ChatMessage[];
  params: SourceParams;
}

// Source that records every call and answers through `reply`
export function recordingSource(
  name: string,
  reply: (params: SourceParams) => SourceReply | Promise<SourceReply>,
  options: { family?: string; modes?: string[]; enabled?: boolean } = {}
): CandidateSource & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    name,
    family: options.family ?? name,
    modes: options.modes ?? ['all'],
    enabled: options.enabled ?? true,
    calls,
    async call(messages: ChatMessage[], params: SourceParams): Promise<SourceReply> {
      calls.push({ messages, params });
      return reply(params);
    }
  };
}

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
