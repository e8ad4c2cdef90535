import { z } from 'zod';

export const emotionModeSchema = z.enum(['normal', 'erotic', 'debate']);

const component = z.coerce.number().finite().default(0);

export const emotionSignalSchema = z.object({
  mode: emotionModeSchema.catch('normal'),
  affection: component,
  arousal: component,
  tension: component,
  anger: component,
  sadness: component,
  excitement: component
});
