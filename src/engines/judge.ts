import {
  Candidate,
  CandidateSet,
  LengthMode,
  RandomSource,
  ScoredCandidate,
  SelectionResult,
  SelectionStrategy
} from '../types';
import { createLogger, Logger } from '../utils/logger';

interface LengthBand {
  base: number;
  jitter: number; // symmetric, in characters
}

const FIXED_BANDS: Record<'short' | 'long' | 'story', LengthBand> = {
  short: { base: 90, jitter: 30 },
  long: { base: 280, jitter: 60 },
  story: { base: 500, jitter: 100 }
};

// auto mode occasionally asks for a one-liner
const VERY_SHORT_BAND: LengthBand = { base: 50, jitter: 20 };
const AUTO_VERY_SHORT_CHANCE = 0.05;
const AUTO_LONG_CHANCE = 0.05;

// User-length blend: short user text => longer reply
const BLEND_LONG_TARGET = 260;
const BLEND_SHORT_TARGET = 120;
const BLEND_USER_CAP = 300;
const BLEND_JITTER_RATIO = 0.15;
const BLEND_FLOOR = 60;

export const NO_USABLE_CANDIDATE = 'no usable candidate';

export interface SelectRequest {
  candidates: CandidateSet;
  priorityOrder?: string[];
  lengthMode: LengthMode;
  userText: string;
}

export function textLength(text: string): number {
  return Array.from(text.trim()).length;
}

export function isUsable(candidate: Candidate): boolean {
  return candidate.status === 'ok' && candidate.text.trim().length > 0;
}

// Closeness to the target length, not a quality score
export function lengthScore(length: number, target: number): number {
  if (target <= 0) return 0;
  const raw = 1 - Math.abs(length - target) / target;
  return Math.max(0, Math.min(1, raw));
}

export class Judge {
  private random: RandomSource;
  private logger: Logger;

  constructor(random: RandomSource = Math.random, logger?: Logger) {
    this.random = random;
    this.logger = logger ?? createLogger('judge');
  }

  targetLength(lengthMode: LengthMode, userTextLength: number): number {
    switch (lengthMode) {
      case 'short':
      case 'long':
      case 'story':
        return this.jittered(FIXED_BANDS[lengthMode]);

      case 'normal':
        return this.blendedTarget(userTextLength);

      case 'auto': {
        const roll = this.random();
        if (roll < AUTO_VERY_SHORT_CHANCE) return this.jittered(VERY_SHORT_BAND);
        if (roll < AUTO_VERY_SHORT_CHANCE + AUTO_LONG_CHANCE) return this.jittered(FIXED_BANDS.long);
        return this.blendedTarget(userTextLength);
      }
    }
  }

  select(request: SelectRequest): SelectionResult {
    const { candidates, lengthMode, userText } = request;
    const priorityOrder = request.priorityOrder ?? [];
    const userLength = textLength(userText);
    const target = this.targetLength(lengthMode, userLength);

    const scored: ScoredCandidate[] = Object.values(candidates).map(candidate =>
      this.scoreCandidate(candidate, target)
    );
    const usable = scored.filter(entry => entry.details.usable);

    const base = {
      length_mode: lengthMode,
      target_length: target,
      scored_candidates: scored
    };

    if (usable.length === 0) {
      this.logger.warn({ target, lengthMode }, 'No usable candidate');
      return {
        ...base,
        status: 'error',
        chosen_source: '',
        chosen_text: '',
        strategy: 'none',
        decision_reason: `${NO_USABLE_CANDIDATE} (length_mode=${lengthMode}, target_len=${target}, user_len=${userLength})`
      };
    }

    const { winner, strategy } = this.pickWinner(usable, priorityOrder, lengthMode);
    const chosen = candidates[winner.source_name];

    const reason =
      `[judge] strategy=${strategy}, length_mode=${lengthMode}, target_len=${target}, ` +
      `user_len=${userLength}, chosen=${winner.source_name} ` +
      `(len=${winner.length}, score=${winner.score.toFixed(3)})`;

    this.logger.debug({ chosen: winner.source_name, strategy, target }, 'Candidate selected');

    return {
      ...base,
      status: 'ok',
      chosen_source: winner.source_name,
      chosen_text: chosen.text,
      strategy,
      decision_reason: reason
    };
  }

  private pickWinner(
    usable: ScoredCandidate[],
    priorityOrder: string[],
    lengthMode: LengthMode
  ): { winner: ScoredCandidate; strategy: SelectionStrategy } {
    // Priority overrides score entirely
    for (const name of priorityOrder) {
      const hit = usable.find(entry => entry.source_name === name);
      if (hit) return { winner: hit, strategy: 'priority_first' };
    }

    if (lengthMode === 'story') {
      return { winner: firstMax(usable, entry => entry.length), strategy: 'length_max' };
    }
    return { winner: firstMax(usable, entry => entry.score), strategy: 'score_max' };
  }

  private scoreCandidate(candidate: Candidate, target: number): ScoredCandidate {
    const usable = isUsable(candidate);
    const length = usable ? textLength(candidate.text) : 0;
    const closeness = usable ? lengthScore(length, target) : 0;

    return {
      source_name: candidate.source_name,
      score: usable ? closeness : -1,
      length,
      status: candidate.status,
      details: {
        usable,
        length_score: closeness,
        target_length: target,
        ...(candidate.error_message ? { error_message: candidate.error_message } : {})
      }
    };
  }

  private blendedTarget(userTextLength: number): number {
    const u = Math.min(Math.max(userTextLength, 0), BLEND_USER_CAP) / BLEND_USER_CAP;
    const blend = BLEND_LONG_TARGET * (1 - u) + BLEND_SHORT_TARGET * u;
    const target = this.jittered({ base: blend, jitter: blend * BLEND_JITTER_RATIO });
    return Math.max(BLEND_FLOOR, target);
  }

  private jittered(band: LengthBand): number {
    const offset = (this.random() * 2 - 1) * band.jitter;
    return Math.max(1, Math.round(band.base + offset));
  }
}

// Ties go to the first maximum encountered
function firstMax<T>(items: T[], key: (item: T) => number): T {
  let best = items[0];
  for (const item of items.slice(1)) {
    if (key(item) > key(best)) best = item;
  }
  return best;
}
