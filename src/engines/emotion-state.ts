import {
  AffectionZone,
  EmotionLayer,
  EmotionLayers,
  EmotionSignal,
  EmotionState,
  EmotionStateFields,
  LongTermSample,
  RelationshipSnapshot,
  RelationshipStage,
  SIGNAL_COMPONENTS
} from '../types';

export const AFFECTION_ZONE_BOUNDS = { mid: 0.33, high: 0.66, extreme: 0.9 } as const;

const RELATIONSHIP_BANDS: Array<[number, RelationshipStage]> = [
  [80, 'soulmate'],
  [60, 'dating'],
  [40, 'close_friends'],
  [20, 'friendly']
];

// doki_power thresholds for levels 1-4
const DOKI_LEVEL_THRESHOLDS = [25, 50, 80, 95];
const MAX_DOKI_BONUS = 0.3;
const DEFAULT_SMOOTHING_ALPHA = 0.3;

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function neutralSignal(): EmotionSignal {
  return {
    mode: 'normal',
    affection: 0,
    arousal: 0,
    tension: 0,
    anger: 0,
    sadness: 0,
    excitement: 0
  };
}

export function affectionZone(affection: number): AffectionZone {
  if (!(affection >= AFFECTION_ZONE_BOUNDS.mid)) return 'low';
  if (affection < AFFECTION_ZONE_BOUNDS.high) return 'mid';
  if (affection < AFFECTION_ZONE_BOUNDS.extreme) return 'high';
  return 'extreme';
}

export function relationshipStage(level: number): RelationshipStage {
  const x = clamp(level, 0, 100);
  const band = RELATIONSHIP_BANDS.find(([threshold]) => x >= threshold);
  return band ? band[1] : 'acquaintance';
}

// 0 = transparent, 1 = fully masked
export function maskingDegree(relationshipLevel: number): number {
  return 1 - clamp(relationshipLevel, 0, 100) / 100;
}

export function dokiLevelFromPower(dokiPower: number): number {
  const power = clamp(dokiPower, 0, 100);
  return DOKI_LEVEL_THRESHOLDS.filter(threshold => power >= threshold).length;
}

export function affectionWithDoki(affection: number, dokiPower: number): number {
  const bonus = (clamp(dokiPower, 0, 100) / 100) * MAX_DOKI_BONUS;
  return clamp(affection + bonus, 0, 1);
}

/**
 * Exponential smoothing of the persisted relationship level.
 * The target is the importance-weighted mean affection (scaled to 0-100);
 * the step size is alpha scaled by the mean importance of the samples.
 */
export function smoothRelationshipLevel(
  currentLevel: number,
  samples: LongTermSample[],
  alpha: number = DEFAULT_SMOOTHING_ALPHA
): number {
  const current = clamp(currentLevel, 0, 100);
  const weighted = samples
    .map(sample => ({
      affection: clamp(sample.affection, 0, 1),
      importance: clamp(sample.importance, 0, 1)
    }))
    .filter(sample => sample.importance > 0);

  if (weighted.length === 0) return current;

  const totalImportance = weighted.reduce((sum, s) => sum + s.importance, 0);
  const target = (weighted.reduce((sum, s) => sum + s.affection * s.importance, 0) / totalImportance) * 100;
  const step = clamp(alpha, 0, 1) * (totalImportance / weighted.length);

  return clamp((1 - step) * current + step * target, 0, 100);
}

function mergeLayers(layers: EmotionLayers): EmotionStateFields {
  const merged: EmotionStateFields = { ...neutralSignal(), doki_power: 0, relationship_level: 0 };
  const ordered = [layers.long_term, layers.short_term_base, layers.manual_override, layers.debug_override];

  for (const layer of ordered) {
    if (!layer) continue;
    overwriteDefined(merged, layer);
  }
  return merged;
}

function overwriteDefined(target: EmotionStateFields, layer: EmotionLayer): void {
  for (const key of SIGNAL_COMPONENTS) {
    const value = layer[key];
    if (value !== undefined) target[key] = value;
  }
  if (layer.mode !== undefined) target.mode = layer.mode;
  if (layer.doki_power !== undefined) target.doki_power = layer.doki_power;
  if (layer.doki_level !== undefined) target.doki_level = layer.doki_level;
  if (layer.relationship_level !== undefined) target.relationship_level = layer.relationship_level;
  if (layer.masking_degree !== undefined) target.masking_degree = layer.masking_degree;
  if (layer.affection_with_doki !== undefined) target.affection_with_doki = layer.affection_with_doki;
}

/**
 * Emotional state merged from long-term, short-term, manual and debug layers.
 * Bounded fields are clamped once here; derived fields are recomputed on every read.
 */
export class EmotionStateModel {
  private readonly fields: EmotionStateFields;

  constructor(layers: EmotionLayers) {
    const merged = mergeLayers(layers);
    this.fields = {
      ...merged,
      doki_power: clamp(merged.doki_power, 0, 100),
      relationship_level: clamp(merged.relationship_level, 0, 100),
      doki_level: merged.doki_level === undefined ? undefined : Math.round(clamp(merged.doki_level, 0, 4)),
      masking_degree: merged.masking_degree === undefined ? undefined : clamp(merged.masking_degree, 0, 1),
      affection_with_doki:
        merged.affection_with_doki === undefined ? undefined : clamp(merged.affection_with_doki, 0, 1)
    };
  }

  get signal(): EmotionSignal {
    const { mode, affection, arousal, tension, anger, sadness, excitement } = this.fields;
    return { mode, affection, arousal, tension, anger, sadness, excitement };
  }

  get dokiPower(): number {
    return this.fields.doki_power;
  }

  get dokiLevel(): number {
    return this.fields.doki_level ?? dokiLevelFromPower(this.fields.doki_power);
  }

  get relationshipLevel(): number {
    return this.fields.relationship_level;
  }

  get relationshipStage(): RelationshipStage {
    return relationshipStage(this.fields.relationship_level);
  }

  get maskingDegree(): number {
    return this.fields.masking_degree ?? maskingDegree(this.fields.relationship_level);
  }

  get affectionWithDoki(): number {
    return this.fields.affection_with_doki ?? affectionWithDoki(this.fields.affection, this.fields.doki_power);
  }

  get affectionZone(): AffectionZone {
    return affectionZone(this.affectionWithDoki);
  }

  withRelationshipLevel(level: number): EmotionStateModel {
    return new EmotionStateModel({ long_term: { ...this.fields, relationship_level: level } });
  }

  toState(): EmotionState {
    return {
      ...this.signal,
      doki_power: this.dokiPower,
      doki_level: this.dokiLevel,
      relationship_level: this.relationshipLevel,
      relationship_stage: this.relationshipStage,
      masking_degree: this.maskingDegree,
      affection_with_doki: this.affectionWithDoki,
      affection_zone: this.affectionZone
    };
  }

  toSnapshot(shortTerm: EmotionSignal | null, now: Date = new Date()): RelationshipSnapshot {
    const state = this.toState();
    return {
      relationship_level: state.relationship_level,
      relationship_stage: state.relationship_stage,
      doki_power: state.doki_power,
      doki_level: state.doki_level,
      masking_degree: state.masking_degree,
      affection_with_doki: state.affection_with_doki,
      affection_zone: state.affection_zone,
      short_term: shortTerm,
      updated_at: now.toISOString()
    };
  }
}

export function buildEmotionState(layers: EmotionLayers): EmotionState {
  return new EmotionStateModel(layers).toState();
}

// Only the persisted fields are carried forward; derived ones are recomputed
export function longTermLayer(snapshot: RelationshipSnapshot | null): EmotionLayer | null {
  if (!snapshot) return null;
  return {
    relationship_level: snapshot.relationship_level,
    doki_power: snapshot.doki_power
  };
}
