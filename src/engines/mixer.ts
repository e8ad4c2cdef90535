import {
  EmotionLayer,
  EmotionSignal,
  EmotionState,
  RelationshipSnapshot,
  SIGNAL_COMPONENTS,
  SignalPatch
} from '../types';
import { EmotionStateModel, longTermLayer } from './emotion-state';

export interface EmotionOverride {
  signal: EmotionSignal;
  state: EmotionState;
}

export interface MixInput {
  shortTerm: EmotionSignal | null;
  sceneBonus?: SignalPatch | null;
  manual?: EmotionLayer | null;
  debug?: EmotionLayer | null;
  persisted?: RelationshipSnapshot | null;
}

/**
 * Merges the short-term signal with the scene bonus and the manual/debug
 * overrides into the signal that biases prompting and mode selection.
 */
export class EmotionMixer {
  // Absent short-term signal => null, callers then skip biasing
  fuse(
    shortTerm: EmotionSignal | null,
    sceneBonus?: SignalPatch | null,
    manual?: EmotionLayer | null,
    debug?: EmotionLayer | null
  ): EmotionSignal | null {
    if (!shortTerm) return null;

    const fused: EmotionSignal = { ...shortTerm };
    if (sceneBonus) {
      for (const key of SIGNAL_COMPONENTS) {
        fused[key] += sceneBonus[key] ?? 0;
      }
    }

    for (const patch of [manual, debug]) {
      if (!patch) continue;
      for (const key of SIGNAL_COMPONENTS) {
        const value = patch[key];
        if (value !== undefined) fused[key] = value;
      }
      if (patch.mode !== undefined) fused.mode = patch.mode;
    }

    return fused;
  }

  buildOverride(input: MixInput): EmotionOverride | null {
    const signal = this.fuse(input.shortTerm, input.sceneBonus, input.manual, input.debug);
    if (!signal) return null;

    const model = new EmotionStateModel({
      long_term: longTermLayer(input.persisted ?? null),
      short_term_base: signal,
      manual_override: input.manual,
      debug_override: input.debug
    });
    return { signal, state: model.toState() };
  }
}
