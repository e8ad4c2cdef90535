import { EmotionMode, EmotionSignal, SignalComponent } from '../types';
import { CompanionError } from '../utils/errors';

export interface Threshold {
  component: SignalComponent;
  op: 'gte' | 'lt';
  value: number;
}

// Any clause matching selects the mode; a clause matches when all its thresholds hold.
// An empty clause always matches.
export interface ModeRule {
  mode: EmotionMode;
  priority: number;
  anyOf: Threshold[][];
}

export type ModePredicate = (signal: Partial<EmotionSignal>) => EmotionMode | null;

export const DEFAULT_MODE_RULES: readonly ModeRule[] = [
  {
    mode: 'erotic',
    priority: 100,
    anyOf: [
      [{ component: 'arousal', op: 'gte', value: 0.55 }],
      [
        { component: 'affection', op: 'gte', value: 0.75 },
        { component: 'excitement', op: 'gte', value: 0.4 }
      ]
    ]
  },
  {
    mode: 'debate',
    priority: 80,
    anyOf: [
      [{ component: 'anger', op: 'gte', value: 0.5 }],
      [{ component: 'tension', op: 'gte', value: 0.65 }],
      [
        { component: 'excitement', op: 'gte', value: 0.7 },
        { component: 'arousal', op: 'lt', value: 0.3 }
      ]
    ]
  },
  {
    mode: 'normal',
    priority: 0,
    anyOf: [[]]
  }
];

function holds(threshold: Threshold, signal: Partial<EmotionSignal>): boolean {
  const value = signal[threshold.component] ?? 0;
  return threshold.op === 'gte' ? value >= threshold.value : value < threshold.value;
}

export function compileRule(rule: ModeRule): ModePredicate {
  return signal =>
    rule.anyOf.some(clause => clause.every(threshold => holds(threshold, signal))) ? rule.mode : null;
}

export class ModeSelector {
  private readonly predicates: Array<{ mode: EmotionMode; priority: number; select: ModePredicate }>;

  constructor(rules: readonly ModeRule[] = DEFAULT_MODE_RULES) {
    if (rules.length === 0) {
      throw new CompanionError('config_invalid', 'ModeSelector needs at least one rule');
    }

    const sorted = [...rules].sort((a, b) => b.priority - a.priority);
    const fallback = sorted[sorted.length - 1];
    if (!fallback.anyOf.some(clause => clause.length === 0)) {
      throw new CompanionError(
        'config_invalid',
        `Lowest-priority mode rule "${fallback.mode}" must contain an unconditional clause`
      );
    }

    this.predicates = sorted.map(rule => ({
      mode: rule.mode,
      priority: rule.priority,
      select: compileRule(rule)
    }));
  }

  get fallbackMode(): EmotionMode {
    return this.predicates[this.predicates.length - 1].mode;
  }

  selectMode(signal: Partial<EmotionSignal> | null): EmotionMode {
    if (!signal) return this.fallbackMode;

    for (const predicate of this.predicates) {
      const mode = predicate.select(signal);
      if (mode !== null) return mode;
    }
    return this.fallbackMode;
  }
}
