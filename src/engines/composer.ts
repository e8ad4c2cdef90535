import {
  Candidate,
  CandidateSet,
  ComposedResult,
  ComposeSummary,
  DecisionMode,
  RefineOutcome,
  Refiner,
  ScenePrefs,
  SelectionResult
} from '../types';
import { describeError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import { isUsable, textLength } from './judge';

export const DEFAULT_FALLBACK_ORDER = ['gpt51', 'gpt4o', 'grok', 'gemini', 'hermes'];

const INCUMBENT_BONUS = 1.0;
const OVERLENGTH_PENALTY_RATIO = 0.5;
const OVERLENGTH_CAP = 2;

export interface ComposerOptions {
  fallbackOrder?: string[];
  refiner?: Refiner;
  logger?: Logger;
}

export interface ComposeRequest {
  selection: SelectionResult;
  candidates: CandidateSet;
  devForceSource?: string;
  scenePrefs?: ScenePrefs | null;
  userText?: string;
}

interface BasePick {
  candidate: Candidate | null;
  mode: DecisionMode;
}

export class Composer {
  private fallbackOrder: string[];
  private refiner?: Refiner;
  private logger: Logger;

  constructor(options: ComposerOptions = {}) {
    this.fallbackOrder = options.fallbackOrder ?? DEFAULT_FALLBACK_ORDER;
    this.refiner = options.refiner;
    this.logger = options.logger ?? createLogger('composer');
  }

  async compose(request: ComposeRequest): Promise<ComposedResult> {
    const { selection, candidates, devForceSource, scenePrefs } = request;

    const forced = devForceSource ? candidates[devForceSource] : undefined;
    const forcedUsable = forced !== undefined && isUsable(forced);
    const devForce = devForceSource
      ? {
          requested: devForceSource,
          applied: forcedUsable,
          ...(forcedUsable ? {} : { reason: forced ? 'candidate not usable' : 'candidate not found' })
        }
      : undefined;

    const base: BasePick =
      forced && forcedUsable
        ? { candidate: forced, mode: 'dev_force' }
        : this.pickBase(selection, candidates);

    const summaryBase = {
      judge_status: selection.status,
      judge_reason: selection.decision_reason,
      ...(devForce ? { dev_force: devForce } : {})
    };

    if (!base.candidate) {
      this.logger.warn('No usable candidate for composition');
      return {
        status: 'error',
        text: '',
        source_model: '',
        decision_mode: 'no_text',
        summary: {
          ...summaryBase,
          base_source: '',
          chosen_source: '',
          decision_mode: 'no_text',
          refine: { status: 'skipped', reason: 'no text to refine' }
        }
      };
    }

    let chosen = base.candidate;
    let decisionMode = base.mode;
    let sceneScores: Record<string, number> | undefined;

    // A dev-forced source is never re-scored
    if (scenePrefs && decisionMode !== 'dev_force') {
      const rescored = this.rescoreForScene(base.candidate, candidates, scenePrefs);
      sceneScores = rescored.scores;
      if (rescored.winner.source_name !== base.candidate.source_name) {
        chosen = rescored.winner;
        decisionMode = 'composer_override';
      }
    }

    const { text, refine } = await this.refine(chosen, candidates, request.userText ?? '');

    const summary: ComposeSummary = {
      ...summaryBase,
      base_source: base.candidate.source_name,
      chosen_source: chosen.source_name,
      decision_mode: decisionMode,
      ...(sceneScores ? { scene_scores: sceneScores } : {}),
      refine
    };

    this.logger.debug({ base: summary.base_source, chosen: summary.chosen_source, decisionMode }, 'Composed');

    return {
      status: 'ok',
      text,
      source_model: chosen.source_name,
      decision_mode: decisionMode,
      summary
    };
  }

  private pickBase(selection: SelectionResult, candidates: CandidateSet): BasePick {
    if (selection.status === 'ok') {
      const judged = candidates[selection.chosen_source];
      if (judged && isUsable(judged)) {
        return { candidate: judged, mode: 'judge_choice' };
      }
    }

    for (const name of this.fallbackOrder) {
      const candidate = candidates[name];
      if (candidate && isUsable(candidate)) {
        return { candidate, mode: 'fallback_from_models' };
      }
    }

    const anyUsable = Object.values(candidates).find(isUsable);
    return anyUsable
      ? { candidate: anyUsable, mode: 'fallback_from_models' }
      : { candidate: null, mode: 'no_text' };
  }

  sceneScore(candidate: Candidate, isBase: boolean, prefs: ScenePrefs): number {
    let score = isBase ? INCUMBENT_BONUS : 0;
    if (!prefs.prefer_short || prefs.max_chars <= 0) return score;

    const length = textLength(candidate.text);
    score += prefs.weight_short * (1 - Math.min(1, length / prefs.max_chars));
    if (length > prefs.max_chars) {
      const over = Math.min(OVERLENGTH_CAP, (length - prefs.max_chars) / prefs.max_chars);
      score -= prefs.weight_short * OVERLENGTH_PENALTY_RATIO * over;
    }
    return score;
  }

  private rescoreForScene(
    base: Candidate,
    candidates: CandidateSet,
    prefs: ScenePrefs
  ): { winner: Candidate; scores: Record<string, number> } {
    const scores: Record<string, number> = {};
    let winner = base;
    let best = this.sceneScore(base, true, prefs);
    scores[base.source_name] = best;

    // Ties keep the base
    for (const candidate of Object.values(candidates)) {
      if (candidate.source_name === base.source_name || !isUsable(candidate)) continue;
      const score = this.sceneScore(candidate, false, prefs);
      scores[candidate.source_name] = score;
      if (score > best) {
        best = score;
        winner = candidate;
      }
    }
    return { winner, scores };
  }

  private async refine(
    chosen: Candidate,
    candidates: CandidateSet,
    userText: string
  ): Promise<{ text: string; refine: RefineOutcome }> {
    if (!this.refiner) {
      return { text: chosen.text, refine: { status: 'skipped', reason: 'no refiner configured' } };
    }

    const others = Object.values(candidates)
      .filter(c => c.source_name !== chosen.source_name && isUsable(c))
      .map(c => ({ source_name: c.source_name, text: c.text }));

    try {
      const refined = await this.refiner({
        userText,
        baseSource: chosen.source_name,
        baseText: chosen.text,
        others
      });

      if (refined.trim().length === 0) {
        return { text: chosen.text, refine: { status: 'unchanged', reason: 'refiner returned blank text' } };
      }
      return {
        text: refined,
        refine: {
          status: 'applied',
          before_length: textLength(chosen.text),
          after_length: textLength(refined)
        }
      };
    } catch (error) {
      this.logger.warn({ err: describeError(error) }, 'Refiner failed; keeping unrefined text');
      return { text: chosen.text, refine: { status: 'error', error: describeError(error) } };
    }
  }
}
