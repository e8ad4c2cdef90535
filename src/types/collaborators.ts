import type { EmotionSignal, EmotionState, RelationshipSnapshot, SignalPatch } from './emotion';
import type { SettingsSnapshot, SourceParams } from './index';

export interface SettingsProvider {
  read(): SettingsSnapshot | Promise<SettingsSnapshot>;
}

export interface PersonaOverrideProvider {
  // Unknown sources resolve to an empty map
  lookupDefaults(sourceName: string): SourceParams;
}

export interface SceneProvider {
  sceneBonus(location: string, time: string): SignalPatch | null;
}

export interface RelationshipStore {
  read(conversationId: string): Promise<RelationshipSnapshot | null>;
  write(conversationId: string, snapshot: RelationshipSnapshot): Promise<void>;
}

export interface EmotionAnalysisInput {
  composedText: string;
  sourceName: string;
  userText: string;
  previous: EmotionState | null;
}

export interface EmotionAnalyzer {
  analyze(input: EmotionAnalysisInput): Promise<EmotionSignal>;
}
