import type { ErrorCode } from '../utils/errors';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type UsageMetadata = Record<string, number>;

export type SourceParams = Record<string, unknown>;

export type SourceReply = [text: string, usage: UsageMetadata | null];

// A pluggable language-model backend. call() must reject on failure
export interface CandidateSource {
  name: string;
  family: string;
  modes: string[]; // "all" or specific emotion modes
  enabled: boolean;
  call(messages: ChatMessage[], params: SourceParams, signal: AbortSignal): Promise<SourceReply>;
}

export type CandidateStatus = 'ok' | 'error' | 'disabled';

export interface Candidate {
  readonly source_name: string;
  readonly status: CandidateStatus;
  readonly text: string;
  readonly usage?: UsageMetadata | null;
  readonly error_code?: ErrorCode;
  readonly error_message?: string;
  readonly trace?: string;
  readonly elapsed_ms?: number;
}

// Never empty
export type CandidateSet = Readonly<Record<string, Candidate>>;

// Keyed by source name or family name
export type SourceOverrideMap = Record<string, SourceParams>;

export const LENGTH_MODES = ['auto', 'short', 'normal', 'long', 'story'] as const;

export type LengthMode = (typeof LENGTH_MODES)[number];

export type SelectionStrategy = 'priority_first' | 'score_max' | 'length_max' | 'none';

export interface ScoredCandidate {
  source_name: string;
  score: number; // -1 when not selectable
  length: number;
  status: CandidateStatus;
  details: {
    usable: boolean;
    length_score: number;
    target_length: number;
    error_message?: string;
  };
}

export interface SelectionResult {
  readonly status: 'ok' | 'error';
  readonly chosen_source: string;
  readonly chosen_text: string;
  readonly decision_reason: string;
  readonly strategy: SelectionStrategy;
  readonly length_mode: LengthMode;
  readonly target_length: number;
  readonly scored_candidates: readonly ScoredCandidate[];
}

export type DecisionMode =
  | 'dev_force'
  | 'judge_choice'
  | 'fallback_from_models'
  | 'composer_override'
  | 'no_text'
  | 'exception';

export interface ScenePrefs {
  prefer_short: boolean;
  max_chars: number;
  weight_short: number;
}

export type RefineOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'applied'; before_length: number; after_length: number }
  | { status: 'unchanged'; reason: string }
  | { status: 'error'; error: string };

export interface ComposeSummary {
  base_source: string;
  chosen_source: string;
  judge_status: SelectionResult['status'];
  judge_reason: string;
  decision_mode: DecisionMode;
  dev_force?: { requested: string; applied: boolean; reason?: string };
  scene_scores?: Record<string, number>;
  refine: RefineOutcome;
  error?: string;
}

export interface ComposedResult {
  readonly status: 'ok' | 'error';
  readonly text: string;
  readonly source_model: string;
  readonly decision_mode: DecisionMode;
  readonly summary: ComposeSummary;
}

export interface SettingsSnapshot {
  enabled_sources: string[];
  priority_order: string[];
  length_mode: LengthMode;
}

export interface RefineInput {
  userText: string;
  baseSource: string;
  baseText: string;
  others: Array<{ source_name: string; text: string }>;
}

export type Refiner = (input: RefineInput) => Promise<string>;

export type RandomSource = () => number;

export * from './emotion';
