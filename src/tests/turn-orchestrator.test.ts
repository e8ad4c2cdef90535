import { SourceRegistry } from '../core/source-registry';
import { StaticSettingsProvider } from '../core/settings';
import { TurnOrchestrator, TurnOutcome } from '../core/turn-orchestrator';
import { StaticSceneProvider } from '../engines/collaborators';
import { CandidateCollector } from '../engines/collector';
import { Composer } from '../engines/composer';
import { HeuristicEmotionAnalyzer } from '../engines/emotion-analyzer';
import { EmotionStateModel, neutralSignal } from '../engines/emotion-state';
import { Judge } from '../engines/judge';
import { EmotionMixer, EmotionOverride } from '../engines/mixer';
import { createScriptedSource } from '../integrations/scripted-source';
import { InMemoryRelationshipStore } from '../storage/relationship-store';
import {
  CandidateSet,
  ChatMessage,
  ComposedResult,
  LengthMode,
  RelationshipSnapshot,
  SelectionResult,
  SignalPatch
} from '../types';
import { EmotionAnalyzer, RelationshipStore } from '../types/collaborators';
import { delay, fixedRandom, recordingSource } from './helpers';

const APOLOGY = 'Sorry, could you say that again?';
const THIRTY = 'b'.repeat(30);

class FailingStore implements RelationshipStore {
  constructor(private failReads: boolean) {}

  async read(): Promise<RelationshipSnapshot | null> {
    if (this.failReads) throw new Error('store offline');
    return null;
  }

  async write(): Promise<void> {
    throw new Error('disk full');
  }
}

class ExplodingJudge extends Judge {
  select(): SelectionResult {
    throw new Error('judge bug');
  }
}

class ExplodingComposer extends Composer {
  async compose(): Promise<ComposedResult> {
    throw new Error('composer bug');
  }
}

class ExplodingMixer extends EmotionMixer {
  buildOverride(): EmotionOverride | null {
    throw new Error('mixer bug');
  }
}

const offlineAnalyzer: EmotionAnalyzer = {
  analyze: async () => {
    throw new Error('analyzer offline');
  }
};

async function seededStore(level: number, shortTerm: SignalPatch | null) {
  const store = new InMemoryRelationshipStore();
  const snapshot = new EmotionStateModel({ long_term: { relationship_level: level } }).toSnapshot(
    shortTerm ? { ...neutralSignal(), ...shortTerm } : null
  );
  await store.write('conv-1', snapshot);
  return store;
}

class ExplodingCollector extends CandidateCollector {
  async collect(): Promise<CandidateSet> {
    throw new Error('pool crashed');
  }
}

function threeSources(): SourceRegistry {
  return new SourceRegistry()
    .register(createScriptedSource({ name: 'A', replies: ['hi'] }))
    .register(createScriptedSource({ name: 'B', replies: [THIRTY] }))
    .register(createScriptedSource({ name: 'C', replies: [new Error('upstream unavailable')] }));
}

function settingsFor(registry: SourceRegistry, lengthMode: LengthMode = 'short', priority: string[] = []) {
  return new StaticSettingsProvider({
    enabled_sources: registry.names(),
    priority_order: priority,
    length_mode: lengthMode
  });
}

const userTurn = (userText: string, conversationId = 'conv-1') => {
  const messages: ChatMessage[] = [{ role: 'user', content: userText }];
  return { conversationId, messages, userText };
};

describe('TurnOrchestrator', () => {
  test('runs every stage and returns the judged reply', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5),
      apologyText: APOLOGY
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(THIRTY);
    expect(outcome.mode).toBe('normal');
    expect(outcome.selection.chosen_source).toBe('B');
    expect(outcome.composed.decision_mode).toBe('judge_choice');
    expect(outcome.trace.conversationId).toBe('conv-1');
    expect(outcome.trace.turnId).toMatch(/^[0-9a-f-]{36}$/);
    expect(outcome.trace.finishedAt).toBeInstanceOf(Date);
    expect(outcome.trace.stages()).toEqual([
      'settings:ok',
      'state_read:ok',
      'scene:skipped',
      'fusion:ok',
      'collect:ok',
      'select:ok',
      'compose:ok',
      'final:ok',
      'emotion_analysis:skipped',
      'emotion_sync:ok'
    ]);
  });

  test('speak returns only the text', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry, 'short', ['A']),
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5)
    });

    expect(await orchestrator.speak(userTurn('hello'))).toBe('hi');
  });

  test('a dev-forced source overrides the judge', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn({ ...userTurn('hello'), devForceSource: 'A' });

    expect(outcome.text).toBe('hi');
    expect(outcome.composed.decision_mode).toBe('dev_force');
  });

  test('returns the apology when every source fails', async () => {
    const registry = new SourceRegistry()
      .register(createScriptedSource({ name: 'A', replies: [new Error('down')] }))
      .register(createScriptedSource({ name: 'B', replies: [new Error('down')] }));
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      analyzer: new HeuristicEmotionAnalyzer(),
      random: fixedRandom(0.5),
      apologyText: APOLOGY
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(APOLOGY);
    expect(outcome.selection.status).toBe('error');
    expect(outcome.composed.decision_mode).toBe('no_text');
    expect(outcome.trace.entries.find(entry => entry.stage === 'emotion_analysis')).toMatchObject({
      status: 'skipped',
      reason: 'no model text this turn'
    });
  });

  test('a settings failure falls back to every registered source', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: {
        read: () => {
          throw new Error('settings offline');
        }
      },
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(THIRTY);
    expect(outcome.trace.errors()).toEqual([
      { stage: 'settings', error: { code: 'settings_sync_failed', message: 'Error: settings offline' } }
    ]);
  });

  test('a judge failure is replaced by a synthesized error selection', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      judge: new ExplodingJudge()
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.selection.status).toBe('error');
    expect(outcome.selection.decision_reason).toBe('selection_exception: Error: judge bug');
    expect(outcome.composed.decision_mode).toBe('fallback_from_models');
    expect(outcome.text).toBe('hi');
  });

  test('a composer failure falls back to the judged text', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      composer: new ExplodingComposer(),
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(THIRTY);
    expect(outcome.composed.decision_mode).toBe('exception');
    expect(outcome.composed.summary.error).toBe('Error: composer bug');
    expect(outcome.trace.errors().map(failure => failure.error.code)).toEqual(['compose_exception']);
  });

  test('a failed emotion sync never changes the returned text', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new FailingStore(false),
      analyzer: new HeuristicEmotionAnalyzer(),
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(THIRTY);
    expect(outcome.emotion).toBeNull();
    expect(outcome.trace.errors()).toEqual([
      { stage: 'emotion_sync', error: { code: 'emotion_sync_failed', message: 'Error: disk full' } }
    ]);
  });

  test('still apologises when every stage fails', async () => {
    const orchestrator = new TurnOrchestrator({
      registry: new SourceRegistry(),
      settings: {
        read: () => {
          throw new Error('settings offline');
        }
      },
      store: new FailingStore(true),
      collector: new ExplodingCollector(new SourceRegistry()),
      judge: new ExplodingJudge(),
      composer: new ExplodingComposer(),
      scene: {
        sceneBonus: () => {
          throw new Error('no map');
        }
      },
      apologyText: APOLOGY
    });

    const outcome = await orchestrator.runTurn({ ...userTurn('hello'), location: 'park' });

    expect(outcome.text).toBe(APOLOGY);
    expect(outcome.trace.errors().map(failure => `${failure.stage}:${failure.error.code}`)).toEqual([
      'settings:settings_sync_failed',
      'state_read:state_read_failed',
      'scene:scene_lookup_failed',
      'collect:collector_failed',
      'select:selection_exception',
      'compose:compose_exception',
      'emotion_sync:emotion_sync_failed'
    ]);
  });

  test('a collector crash is told apart from a source failure', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      collector: new ExplodingCollector(registry),
      apologyText: APOLOGY
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(APOLOGY);
    expect(outcome.candidates.__collector__).toMatchObject({
      status: 'error',
      error_code: 'collector_failed',
      error_message: 'Error: pool crashed'
    });
  });

  test('a fusion failure leaves the turn unbiased', async () => {
    const source = recordingSource('B', () => ['Take your time.', null]);
    const registry = new SourceRegistry().register(source);
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: await seededStore(40, { anger: 0.6 }),
      mixer: new ExplodingMixer(),
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe('Take your time.');
    expect(outcome.mode).toBe('normal');
    expect(source.calls[0].params).toEqual({ mode: 'normal' });
    expect(outcome.trace.stages()).toContain('fusion:error');
    expect(outcome.trace.stages()).not.toContain('fusion:ok');
    expect(outcome.trace.errors()).toEqual([
      { stage: 'fusion', error: { code: 'fusion_failed', message: 'Error: mixer bug' } }
    ]);
  });

  test('a scene bonus reaches fusion and can switch the mode', async () => {
    const source = recordingSource('sparring', () => ['Oh, is that so? Prove it.', null], { modes: ['debate'] });
    const registry = new SourceRegistry().register(source);
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: await seededStore(40, { anger: 0.3 }),
      scene: new StaticSceneProvider({ arena: { anger: 0.3 } }),
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn({ ...userTurn('you are wrong'), location: 'arena' });

    expect(outcome.mode).toBe('debate');
    expect(outcome.text).toBe('Oh, is that so? Prove it.');
    expect(source.calls[0].params.mode).toBe('debate');
    expect(source.calls[0].params.emotion).toMatchObject({ mode: 'normal', anger: expect.closeTo(0.6, 5) });
    expect(outcome.trace.entries.find(entry => entry.stage === 'scene')).toMatchObject({
      status: 'ok',
      data: { anger: 0.3 }
    });
  });

  test('an analyzer failure keeps the text and the relationship level', async () => {
    const registry = threeSources();
    const store = await seededStore(40, null);
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store,
      analyzer: offlineAnalyzer,
      random: fixedRandom(0.5)
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(outcome.text).toBe(THIRTY);
    expect(outcome.nextMode).toBe('normal');
    expect(outcome.trace.errors()).toEqual([
      { stage: 'emotion_analysis', error: { code: 'emotion_analysis_failed', message: 'Error: analyzer offline' } }
    ]);
    expect((await store.read('conv-1'))?.relationship_level).toBe(40);
    expect(outcome.emotion?.relationship_level).toBe(40);
  });

  test('manual and debug overrides shape one turn without reaching the store', async () => {
    const source = recordingSource('warm', () => ['I love you, thank you!', null]);
    const registry = new SourceRegistry().register(source);
    const store = new InMemoryRelationshipStore();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store,
      analyzer: new HeuristicEmotionAnalyzer(),
      random: fixedRandom(0.5)
    });

    const overridden = await orchestrator.runTurn({
      ...userTurn('hi'),
      debugOverride: { relationship_level: 95, doki_power: 100 }
    });

    expect(overridden.emotion?.relationship_level).toBe(95);
    expect(overridden.emotion?.doki_power).toBe(100);
    expect(overridden.emotion?.doki_level).toBe(4);
    expect((await store.read('conv-1'))?.relationship_level).toBeCloseTo(15);
    expect((await store.read('conv-1'))?.doki_power).toBe(0);

    const plain = await orchestrator.runTurn(userTurn('hi again'));
    const persisted = await store.read('conv-1');

    expect(persisted?.relationship_level).toBeCloseTo(25.5);
    expect(persisted?.doki_power).toBe(0);
    expect(plain.emotion?.relationship_stage).toBe('friendly');
  });

  test('mode gating follows the mode hint', async () => {
    const registry = new SourceRegistry()
      .register(createScriptedSource({ name: 'general', replies: ['A plain reply.'] }))
      .register(createScriptedSource({ name: 'spicy', modes: ['erotic'], replies: ['A flirty reply.'] }));
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry, 'short', ['spicy', 'general']),
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5)
    });

    const normal = await orchestrator.runTurn(userTurn('hey'));
    expect(normal.candidates.spicy.status).toBe('disabled');
    expect(normal.text).toBe('A plain reply.');

    const erotic = await orchestrator.runTurn({ ...userTurn('hey'), modeHint: 'erotic' });
    expect(erotic.mode).toBe('erotic');
    expect(erotic.text).toBe('A flirty reply.');
  });

  test('the persisted signal biases the next turn and the relationship grows', async () => {
    const source = recordingSource('warm', () => ['I love you, thank you!', null]);
    const registry = new SourceRegistry().register(source);
    const store = new InMemoryRelationshipStore();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store,
      analyzer: new HeuristicEmotionAnalyzer(),
      random: fixedRandom(0.5)
    });

    const first = await orchestrator.runTurn(userTurn('hi'));
    const afterFirst = await store.read('conv-1');

    expect(first.nextMode).toBe('normal');
    expect(first.emotion?.relationship_stage).toBe('acquaintance');
    expect(afterFirst?.relationship_level).toBeCloseTo(15);
    expect(afterFirst?.short_term).toEqual({
      mode: 'normal',
      affection: 0.5,
      arousal: 0,
      tension: 0,
      anger: 0,
      sadness: 0,
      excitement: 0.25
    });
    expect(source.calls[0].params).toEqual({ mode: 'normal' });

    await orchestrator.runTurn(userTurn('hi again'));
    const afterSecond = await store.read('conv-1');

    expect(source.calls[1].params).toEqual({ mode: 'normal', emotion: afterFirst?.short_term });
    expect(afterSecond?.relationship_level).toBeCloseTo(25.5);
    expect(afterSecond?.relationship_stage).toBe('friendly');
  });

  test('turns for the same conversation never overlap', async () => {
    let active = 0;
    let peak = 0;
    const source = recordingSource('slow', async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(20);
      active--;
      return ['Take your time.', null];
    });
    const registry = new SourceRegistry().register(source);
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5)
    });

    await Promise.all([orchestrator.runTurn(userTurn('one')), orchestrator.runTurn(userTurn('two'))]);
    expect(peak).toBe(1);

    await Promise.all([
      orchestrator.runTurn(userTurn('one', 'conv-a')),
      orchestrator.runTurn(userTurn('two', 'conv-b'))
    ]);
    expect(peak).toBe(2);
  });

  test('emits turn:complete and survives a throwing listener', async () => {
    const registry = threeSources();
    const orchestrator = new TurnOrchestrator({
      registry,
      settings: settingsFor(registry),
      store: new InMemoryRelationshipStore(),
      random: fixedRandom(0.5)
    });
    const seen: TurnOutcome[] = [];
    orchestrator.on('turn:complete', (outcome: TurnOutcome) => seen.push(outcome));
    orchestrator.on('turn:complete', () => {
      throw new Error('listener bug');
    });

    const outcome = await orchestrator.runTurn(userTurn('hello'));

    expect(seen).toEqual([outcome]);
    expect(outcome.text).toBe(THIRTY);
  });
});
