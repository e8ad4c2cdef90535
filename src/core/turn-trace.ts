import {
  CandidateSet,
  ComposedResult,
  EmotionMode,
  EmotionSignal,
  EmotionState,
  RelationshipSnapshot,
  SelectionResult,
  SettingsSnapshot,
  SignalPatch
} from '../types';
import { StageError } from '../utils/errors';

export interface TraceStageData {
  settings: SettingsSnapshot;
  state_read: RelationshipSnapshot | null;
  scene: SignalPatch | null;
  fusion: { signal: EmotionSignal | null; state: EmotionState | null; mode: EmotionMode };
  collect: CandidateSet;
  select: SelectionResult;
  compose: ComposedResult;
  final: { source: 'composed' | 'selection' | 'apology'; length: number };
  emotion_analysis: EmotionSignal;
  emotion_sync: RelationshipSnapshot;
}

export type TraceStage = keyof TraceStageData;

export type TraceEntry =
  | { stage: TraceStage; status: 'ok'; at: string; data: TraceStageData[TraceStage] }
  | { stage: TraceStage; status: 'error'; at: string; error: StageError }
  | { stage: TraceStage; status: 'skipped'; at: string; reason: string };

// Per-turn accumulator; entries are only ever appended
export class TurnTrace {
  readonly turnId: string;
  readonly conversationId: string;
  readonly startedAt: Date;
  finishedAt?: Date;
  private readonly log: TraceEntry[] = [];

  constructor(turnId: string, conversationId: string, startedAt: Date = new Date()) {
    this.turnId = turnId;
    this.conversationId = conversationId;
    this.startedAt = startedAt;
  }

  record<K extends TraceStage>(stage: K, data: TraceStageData[K]): void {
    this.log.push({ stage, status: 'ok', at: new Date().toISOString(), data });
  }

  fail(stage: TraceStage, error: StageError): void {
    this.log.push({ stage, status: 'error', at: new Date().toISOString(), error });
  }

  skip(stage: TraceStage, reason: string): void {
    this.log.push({ stage, status: 'skipped', at: new Date().toISOString(), reason });
  }

  get entries(): readonly TraceEntry[] {
    return this.log;
  }

  stages(): string[] {
    return this.log.map(entry => `${entry.stage}:${entry.status}`);
  }

  errors(): Array<{ stage: TraceStage; error: StageError }> {
    const failures: Array<{ stage: TraceStage; error: StageError }> = [];
    for (const entry of this.log) {
      if (entry.status === 'error') failures.push({ stage: entry.stage, error: entry.error });
    }
    return failures;
  }

  finish(): void {
    this.finishedAt = new Date();
  }

  toJSON() {
    return {
      turn_id: this.turnId,
      conversation_id: this.conversationId,
      started_at: this.startedAt.toISOString(),
      finished_at: this.finishedAt?.toISOString() ?? null,
      entries: this.log
    };
  }
}
