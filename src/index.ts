import dotenv from 'dotenv';
import seedrandom from 'seedrandom';
import { loadConfig, EngineConfig } from './config';
import { StaticSettingsProvider } from './core/settings';
import { SourceRegistry } from './core/source-registry';
import { TurnOrchestrator } from './core/turn-orchestrator';
import { StaticPersonaOverrides, StaticSceneProvider } from './engines/collaborators';
import { HeuristicEmotionAnalyzer, OpenAIEmotionAnalyzer } from './engines/emotion-analyzer';
import { Composer } from './engines/composer';
import { Judge } from './engines/judge';
import { createOpenAIRefiner } from './engines/refiner';
import { OpenAIService } from './integrations/openai';
import { createOpenAISource } from './integrations/openai-source';
import { createScriptedSource } from './integrations/scripted-source';
import { InMemoryRelationshipStore } from './storage/relationship-store';
import { ChatMessage } from './types';
import { EmotionAnalyzer } from './types/collaborators';
import { setLogLevel } from './utils/logger';

export * from './types';
export * from './types/collaborators';
export { loadConfig, DEFAULT_APOLOGY_TEXT } from './config';
export type { EngineConfig } from './config';
export { StaticSettingsProvider } from './core/settings';
export { SourceRegistry } from './core/source-registry';
export { TurnOrchestrator } from './core/turn-orchestrator';
export type { TurnRequest, TurnOutcome, TurnOrchestratorOptions } from './core/turn-orchestrator';
export { TurnTrace } from './core/turn-trace';
export type { TraceEntry, TraceStage } from './core/turn-trace';
export { CandidateCollector, COLLECTOR_DIAGNOSTIC_NAME } from './engines/collector';
export { Judge, NO_USABLE_CANDIDATE, lengthScore, textLength, isUsable } from './engines/judge';
export { Composer, DEFAULT_FALLBACK_ORDER } from './engines/composer';
export { EmotionMixer } from './engines/mixer';
export { ModeSelector, DEFAULT_MODE_RULES } from './engines/mode-selector';
export type { ModeRule, Threshold } from './engines/mode-selector';
export {
  EmotionStateModel,
  buildEmotionState,
  affectionZone,
  relationshipStage,
  maskingDegree,
  dokiLevelFromPower,
  affectionWithDoki,
  smoothRelationshipLevel
} from './engines/emotion-state';
export { HeuristicEmotionAnalyzer, OpenAIEmotionAnalyzer, parseEmotionJson } from './engines/emotion-analyzer';
export { createOpenAIRefiner, buildRefinePrompt } from './engines/refiner';
export { StaticPersonaOverrides, StaticSceneProvider } from './engines/collaborators';
export { OpenAIService } from './integrations/openai';
export { createOpenAISource } from './integrations/openai-source';
export { createScriptedSource } from './integrations/scripted-source';
export { InMemoryRelationshipStore } from './storage/relationship-store';
export { CompanionError, ConfigError } from './utils/errors';
export { createLogger, setLogLevel } from './utils/logger';

function buildOrchestrator(config: EngineConfig): TurnOrchestrator {
  const registry = new SourceRegistry();
  let analyzer: EmotionAnalyzer = new HeuristicEmotionAnalyzer();
  let composer = new Composer();

  if (config.openaiApiKey) {
    const openai = new OpenAIService(config.openaiApiKey);
    registry
      .register(createOpenAISource(openai, { name: 'gpt4o', family: 'openai', model: 'gpt-4o' }))
      .register(
        createOpenAISource(openai, { name: 'gpt4o-mini', family: 'openai', model: 'gpt-4o-mini', maxTokens: 300 })
      );
    analyzer = new OpenAIEmotionAnalyzer(openai);
    composer = new Composer({ refiner: createOpenAIRefiner(openai) });
  } else {
    // Offline: two scripted voices and one source that always fails
    registry
      .register(
        createScriptedSource({
          name: 'warm',
          replies: [
            "I'm so glad you came back! I was hoping we could talk again today.",
            'Thank you for telling me that. It makes me happy you trust me with it.'
          ]
        })
      )
      .register(createScriptedSource({ name: 'brief', replies: ['Mm, I see.', 'Wow, really?'] }))
      .register(createScriptedSource({ name: 'flaky', replies: [new Error('upstream unavailable')] }));
  }

  return new TurnOrchestrator({
    registry,
    settings: StaticSettingsProvider.fromConfig(config, registry.names()),
    store: new InMemoryRelationshipStore(),
    analyzer,
    scene: new StaticSceneProvider({ cafe: { affection: 0.1 }, '@night': { tension: 0.1 } }),
    personaOverrides: new StaticPersonaOverrides({ gpt4o: { temperature: 0.9 } }),
    judge: new Judge(config.seed ? seedrandom(config.seed) : Math.random),
    composer,
    sourceTimeoutMs: config.sourceTimeoutMs,
    maxConcurrency: config.maxConcurrency,
    apologyText: config.apologyText
  });
}

async function runDemo() {
  dotenv.config();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const orchestrator = buildOrchestrator(config);
  const conversationId = 'demo';
  const history: ChatMessage[] = [
    { role: 'system', content: 'You are a gentle, playful companion talking with the user in a small cafe.' }
  ];

  const userTurns = [
    'Hi! I missed talking to you.',
    'Work was rough today, my manager was being so unfair.',
    "Let's go somewhere fun this weekend!"
  ];

  console.log(`Sources: ${config.openaiApiKey ? 'OpenAI' : 'scripted (set OPENAI_API_KEY for live models)'}`);
  console.log('---');

  for (const userText of userTurns) {
    history.push({ role: 'user', content: userText });

    const outcome = await orchestrator.runTurn({
      conversationId,
      messages: [...history],
      userText,
      location: 'cafe',
      time: 'evening'
    });
    history.push({ role: 'assistant', content: outcome.text });

    console.log(`User: ${userText}`);
    console.log(`Companion: ${outcome.text}`);
    console.log(`  mode=${outcome.mode} next=${outcome.nextMode} via ${outcome.composed.decision_mode}`);
    console.log(`  ${outcome.selection.decision_reason}`);
    if (outcome.emotion) {
      console.log(
        `  relationship ${outcome.emotion.relationship_level.toFixed(1)} (${outcome.emotion.relationship_stage}), ` +
          `affection zone ${outcome.emotion.affection_zone}`
      );
    }
    console.log(`  trace: ${outcome.trace.stages().join(' ')}`);
    console.log('---');
  }
}

if (require.main === module) {
  runDemo().catch(console.error);
}
