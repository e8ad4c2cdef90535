export type EmotionMode = 'normal' | 'erotic' | 'debate';

export type AffectionZone = 'low' | 'mid' | 'high' | 'extreme';

export type RelationshipStage =
  | 'acquaintance'
  | 'friendly'
  | 'close_friends'
  | 'dating'
  | 'soulmate';

// Additive; components may leave 0-1 after fusion and are not renormalized
export interface EmotionSignal {
  mode: EmotionMode;
  affection: number;
  arousal: number;
  tension: number;
  anger: number;
  sadness: number;
  excitement: number;
}

export type SignalComponent = Exclude<keyof EmotionSignal, 'mode'>;

export const SIGNAL_COMPONENTS: readonly SignalComponent[] = [
  'affection',
  'arousal',
  'tension',
  'anger',
  'sadness',
  'excitement'
];

export type SignalPatch = Partial<EmotionSignal>;

// Raw inputs of an EmotionState; derived fields are optional explicit overrides
export interface EmotionStateFields extends EmotionSignal {
  doki_power: number; // 0-100
  doki_level?: number; // 0-4
  relationship_level: number; // 0-100, persisted
  masking_degree?: number; // 0-1
  affection_with_doki?: number; // 0-1
}

export type EmotionLayer = Partial<EmotionStateFields>;

// Lowest to highest precedence
export interface EmotionLayers {
  long_term?: EmotionLayer | null;
  short_term_base?: EmotionLayer | null;
  manual_override?: EmotionLayer | null;
  debug_override?: EmotionLayer | null;
}

export interface EmotionState extends EmotionSignal {
  doki_power: number;
  doki_level: number;
  relationship_level: number;
  relationship_stage: RelationshipStage;
  masking_degree: number;
  affection_with_doki: number;
  affection_zone: AffectionZone;
}

export interface LongTermSample {
  affection: number; // 0-1
  importance: number; // 0-1
}

export interface RelationshipSnapshot {
  relationship_level: number;
  relationship_stage: RelationshipStage;
  doki_power: number;
  doki_level: number;
  masking_degree: number;
  affection_with_doki: number;
  affection_zone: AffectionZone;
  short_term: EmotionSignal | null;
  updated_at: string;
}
