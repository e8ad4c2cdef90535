import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_APOLOGY_TEXT } from '../config';
import { CandidateCollector, COLLECTOR_DIAGNOSTIC_NAME } from '../engines/collector';
import { Composer } from '../engines/composer';
import {
  EmotionStateModel,
  longTermLayer,
  smoothRelationshipLevel
} from '../engines/emotion-state';
import { Judge } from '../engines/judge';
import { EmotionMixer, EmotionOverride } from '../engines/mixer';
import { ModeSelector } from '../engines/mode-selector';
import {
  EmotionAnalyzer,
  PersonaOverrideProvider,
  RelationshipStore,
  SceneProvider,
  SettingsProvider
} from '../types/collaborators';
import {
  CandidateSet,
  ChatMessage,
  ComposedResult,
  EmotionLayer,
  EmotionMode,
  EmotionSignal,
  EmotionState,
  RandomSource,
  RelationshipSnapshot,
  ScenePrefs,
  SelectionResult,
  SettingsSnapshot,
  SignalPatch,
  SourceOverrideMap
} from '../types';
import { describeError, runStage, StageError, StageResult } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import { SourceRegistry } from './source-registry';
import { TraceStage, TurnTrace } from './turn-trace';

const DEFAULT_SMOOTHING_ALPHA = 0.3;

export interface TurnRequest {
  conversationId: string;
  messages: ChatMessage[];
  userText: string;
  modeHint?: EmotionMode;
  location?: string;
  time?: string;
  manualOverride?: EmotionLayer | null;
  debugOverride?: EmotionLayer | null;
  devForceSource?: string;
  scenePrefs?: ScenePrefs | null;
  perSourceOverrides?: SourceOverrideMap;
  signal?: AbortSignal;
}

export interface TurnOutcome {
  text: string;
  trace: TurnTrace;
  mode: EmotionMode;
  // Mode suggested by this turn's emotion analysis, for the next turn
  nextMode: EmotionMode;
  candidates: CandidateSet;
  selection: SelectionResult;
  composed: ComposedResult;
  emotion: EmotionState | null;
}

export interface TurnOrchestratorOptions {
  registry: SourceRegistry;
  settings: SettingsProvider;
  store: RelationshipStore;
  analyzer?: EmotionAnalyzer;
  scene?: SceneProvider;
  personaOverrides?: PersonaOverrideProvider;
  collector?: CandidateCollector;
  judge?: Judge;
  composer?: Composer;
  mixer?: EmotionMixer;
  modeSelector?: ModeSelector;
  random?: RandomSource;
  sourceTimeoutMs?: number;
  maxConcurrency?: number;
  apologyText?: string;
  smoothingAlpha?: number;
  logger?: Logger;
}

/**
 * Runs one conversational turn: fusion → collection → judging → composition →
 * emotion sync. Each stage is isolated; the only text ever returned comes from
 * the composed reply, the judge's choice, or the fixed apology.
 */
export class TurnOrchestrator extends EventEmitter {
  private registry: SourceRegistry;
  private settings: SettingsProvider;
  private store: RelationshipStore;
  private analyzer?: EmotionAnalyzer;
  private scene?: SceneProvider;
  private collector: CandidateCollector;
  private judge: Judge;
  private composer: Composer;
  private mixer: EmotionMixer;
  private modeSelector: ModeSelector;
  private apologyText: string;
  private smoothingAlpha: number;
  private logger: Logger;

  // At most one in-flight turn per conversation
  private inFlight: Map<string, Promise<TurnOutcome>> = new Map();

  constructor(options: TurnOrchestratorOptions) {
    super();
    this.registry = options.registry;
    this.settings = options.settings;
    this.store = options.store;
    this.analyzer = options.analyzer;
    this.scene = options.scene;
    this.collector =
      options.collector ??
      new CandidateCollector(options.registry, {
        timeoutMs: options.sourceTimeoutMs,
        maxConcurrency: options.maxConcurrency,
        personaOverrides: options.personaOverrides
      });
    this.judge = options.judge ?? new Judge(options.random);
    this.composer = options.composer ?? new Composer();
    this.mixer = options.mixer ?? new EmotionMixer();
    this.modeSelector = options.modeSelector ?? new ModeSelector();
    this.apologyText = options.apologyText ?? DEFAULT_APOLOGY_TEXT;
    this.smoothingAlpha = options.smoothingAlpha ?? DEFAULT_SMOOTHING_ALPHA;
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  async runTurn(request: TurnRequest): Promise<TurnOutcome> {
    const previous: Promise<unknown> = this.inFlight.get(request.conversationId) ?? Promise.resolve();
    const run = previous.then(() => this.executeTurn(request));
    this.inFlight.set(request.conversationId, run);

    try {
      return await run;
    } finally {
      if (this.inFlight.get(request.conversationId) === run) {
        this.inFlight.delete(request.conversationId);
      }
    }
  }

  async speak(request: TurnRequest): Promise<string> {
    const outcome = await this.runTurn(request);
    return outcome.text;
  }

  private async executeTurn(request: TurnRequest): Promise<TurnOutcome> {
    const trace = new TurnTrace(uuidv4(), request.conversationId);
    let outcome: TurnOutcome;

    try {
      outcome = await this.pipeline(request, trace);
    } catch (error) {
      // Stages catch their own failures; this only guards the glue between them
      this.logger.error({ err: describeError(error), turnId: trace.turnId }, 'Turn pipeline failed');
      trace.fail('final', { code: 'compose_exception', message: describeError(error) });
      outcome = this.apologyOutcome(trace);
    }

    trace.finish();
    try {
      this.emit('turn:complete', outcome);
    } catch (error) {
      this.logger.error({ err: describeError(error) }, 'turn:complete listener failed');
    }
    return outcome;
  }

  private async pipeline(request: TurnRequest, trace: TurnTrace): Promise<TurnOutcome> {
    const { conversationId } = request;

    // 1) effective settings
    const settingsResult = await runStage('settings_sync_failed', () => this.settings.read());
    let settings: SettingsSnapshot;
    if (settingsResult.ok) {
      settings = settingsResult.value;
      trace.record('settings', settings);
    } else {
      settings = this.defaultSettings();
      this.warnStage(trace, 'settings', settingsResult.error);
    }

    const persistedResult = await runStage('state_read_failed', () => this.store.read(conversationId));
    let persisted: RelationshipSnapshot | null = null;
    if (persistedResult.ok) {
      persisted = persistedResult.value;
      trace.record('state_read', persisted);
    } else {
      this.warnStage(trace, 'state_read', persistedResult.error);
    }

    // 2) emotion fusion
    const fusion = await this.fuseEmotion(request, persisted, trace);
    const override = fusion.ok ? fusion.value : null;
    const mode = request.modeHint ?? this.modeSelector.selectMode(override?.signal ?? null);
    if (fusion.ok) {
      trace.record('fusion', { signal: override?.signal ?? null, state: override?.state ?? null, mode });
    } else {
      // Unbiased turn
      this.warnStage(trace, 'fusion', fusion.error);
    }

    // 3) candidate collection
    const collectResult = await runStage('collector_failed', () =>
      this.collector.collect({
        messages: request.messages,
        enabledSources: this.registry.enabledFor(mode, settings.enabled_sources),
        perSourceOverrides: request.perSourceOverrides,
        commonParams: { mode, ...(override ? { emotion: override.signal } : {}) },
        signal: request.signal
      })
    );
    let candidates: CandidateSet;
    if (collectResult.ok) {
      candidates = collectResult.value;
      trace.record('collect', candidates);
    } else {
      candidates = {
        [COLLECTOR_DIAGNOSTIC_NAME]: {
          source_name: COLLECTOR_DIAGNOSTIC_NAME,
          status: 'error',
          text: '',
          usage: null,
          error_code: collectResult.error.code,
          error_message: collectResult.error.message
        }
      };
      this.warnStage(trace, 'collect', collectResult.error);
    }

    // 4) selection
    const selectResult = await runStage('selection_exception', () =>
      this.judge.select({
        candidates,
        priorityOrder: settings.priority_order,
        lengthMode: settings.length_mode,
        userText: request.userText
      })
    );
    let selection: SelectionResult;
    if (selectResult.ok) {
      selection = selectResult.value;
      trace.record('select', selection);
    } else {
      selection = {
        status: 'error',
        chosen_source: '',
        chosen_text: '',
        decision_reason: `selection_exception: ${selectResult.error.message}`,
        strategy: 'none',
        length_mode: settings.length_mode,
        target_length: 0,
        scored_candidates: []
      };
      this.warnStage(trace, 'select', selectResult.error);
    }

    // 5) composition
    const composeResult = await runStage('compose_exception', () =>
      this.composer.compose({
        selection,
        candidates,
        devForceSource: request.devForceSource,
        scenePrefs: request.scenePrefs,
        userText: request.userText
      })
    );
    let composed: ComposedResult;
    if (composeResult.ok) {
      composed = composeResult.value;
      trace.record('compose', composed);
    } else {
      composed = this.composeFallback(selection, composeResult.error);
      this.warnStage(trace, 'compose', composeResult.error);
    }

    // 6) final text: composed, else judge's choice, else apology
    let text: string;
    let finalSource: 'composed' | 'selection' | 'apology';
    if (composed.text) {
      text = composed.text;
      finalSource = 'composed';
    } else if (selection.chosen_text) {
      text = selection.chosen_text;
      finalSource = 'selection';
    } else {
      text = this.apologyText;
      finalSource = 'apology';
    }
    trace.record('final', { source: finalSource, length: text.length });

    // 7) post-hoc emotion sync; never touches `text`
    const { emotion, nextMode } = await this.syncEmotion(request, persisted, override, composed, finalSource, mode, trace);

    return { text, trace, mode, nextMode, candidates, selection, composed, emotion };
  }

  private async fuseEmotion(
    request: TurnRequest,
    persisted: RelationshipSnapshot | null,
    trace: TurnTrace
  ): Promise<StageResult<EmotionOverride | null>> {
    let sceneBonus: SignalPatch | null = null;
    if (this.scene && request.location !== undefined) {
      const scene = this.scene;
      const location = request.location;
      const sceneResult = await runStage('scene_lookup_failed', () =>
        scene.sceneBonus(location, request.time ?? '')
      );
      if (sceneResult.ok) {
        sceneBonus = sceneResult.value;
        trace.record('scene', sceneBonus);
      } else {
        this.warnStage(trace, 'scene', sceneResult.error);
      }
    } else {
      trace.skip('scene', 'no scene collaborator or location');
    }

    return runStage('fusion_failed', () =>
      this.mixer.buildOverride({
        shortTerm: persisted?.short_term ?? null,
        sceneBonus,
        manual: request.manualOverride,
        debug: request.debugOverride,
        persisted
      })
    );
  }

  private async syncEmotion(
    request: TurnRequest,
    persisted: RelationshipSnapshot | null,
    override: EmotionOverride | null,
    composed: ComposedResult,
    finalSource: 'composed' | 'selection' | 'apology',
    mode: EmotionMode,
    trace: TurnTrace
  ): Promise<{ emotion: EmotionState | null; nextMode: EmotionMode }> {
    let shortTerm: EmotionSignal | null = null;

    if (!this.analyzer) {
      trace.skip('emotion_analysis', 'no analyzer configured');
    } else if (finalSource === 'apology') {
      trace.skip('emotion_analysis', 'no model text this turn');
    } else {
      const analyzer = this.analyzer;
      const analysis = await runStage('emotion_analysis_failed', () =>
        analyzer.analyze({
          composedText: composed.text,
          sourceName: composed.source_model,
          userText: request.userText,
          previous: override?.state ?? null
        })
      );
      if (analysis.ok) {
        shortTerm = analysis.value;
        trace.record('emotion_analysis', shortTerm);
      } else {
        this.warnStage(trace, 'emotion_analysis', analysis.error);
      }
    }

    const sync = await runStage('emotion_sync_failed', async () => {
      const baseSignal = shortTerm ?? persisted?.short_term ?? null;

      // Manual and debug layers apply to this turn only and never reach the store
      const persistent = new EmotionStateModel({
        long_term: longTermLayer(persisted),
        short_term_base: baseSignal
      });
      const samples = shortTerm ? [{ affection: persistent.affectionWithDoki, importance: 1 }] : [];
      const level = smoothRelationshipLevel(persistent.relationshipLevel, samples, this.smoothingAlpha);
      const updated = persistent.withRelationshipLevel(level);

      const snapshot = updated.toSnapshot(baseSignal);
      await this.store.write(request.conversationId, snapshot);

      const state = new EmotionStateModel({
        long_term: longTermLayer(snapshot),
        short_term_base: baseSignal,
        manual_override: request.manualOverride,
        debug_override: request.debugOverride
      }).toState();
      return { snapshot, state };
    });

    const nextMode = shortTerm ? this.modeSelector.selectMode(shortTerm) : mode;
    if (sync.ok) {
      trace.record('emotion_sync', sync.value.snapshot);
      return { emotion: sync.value.state, nextMode };
    }

    this.warnStage(trace, 'emotion_sync', sync.error);
    return { emotion: null, nextMode };
  }

  private composeFallback(selection: SelectionResult, error: StageError): ComposedResult {
    return {
      status: selection.status,
      text: selection.chosen_text,
      source_model: selection.chosen_source,
      decision_mode: 'exception',
      summary: {
        base_source: selection.chosen_source,
        chosen_source: selection.chosen_source,
        judge_status: selection.status,
        judge_reason: selection.decision_reason,
        decision_mode: 'exception',
        refine: { status: 'skipped', reason: 'composition failed' },
        error: error.message
      }
    };
  }

  private apologyOutcome(trace: TurnTrace): TurnOutcome {
    const selection: SelectionResult = {
      status: 'error',
      chosen_source: '',
      chosen_text: '',
      decision_reason: 'turn aborted',
      strategy: 'none',
      length_mode: 'auto',
      target_length: 0,
      scored_candidates: []
    };
    return {
      text: this.apologyText,
      trace,
      mode: this.modeSelector.fallbackMode,
      nextMode: this.modeSelector.fallbackMode,
      candidates: {},
      selection,
      composed: this.composeFallback(selection, { code: 'compose_exception', message: 'turn aborted' }),
      emotion: null
    };
  }

  private defaultSettings(): SettingsSnapshot {
    return {
      enabled_sources: this.registry.names(),
      priority_order: [],
      length_mode: 'auto'
    };
  }

  private warnStage(trace: TurnTrace, stage: TraceStage, error: StageError): void {
    this.logger.warn({ stage, code: error.code, err: error.message, turnId: trace.turnId }, 'Stage failed');
    trace.fail(stage, error);
  }
}
