import { PersonaOverrideProvider, SceneProvider } from '../types/collaborators';
import { SignalPatch, SourceParams } from '../types';

export class StaticPersonaOverrides implements PersonaOverrideProvider {
  private defaults: Map<string, SourceParams>;

  constructor(defaults: Record<string, SourceParams> = {}) {
    this.defaults = new Map(Object.entries(defaults));
  }

  lookupDefaults(sourceName: string): SourceParams {
    return { ...(this.defaults.get(sourceName) ?? {}) };
  }
}

// Bonuses keyed by "location@time", "location" or "@time", most specific first
export class StaticSceneProvider implements SceneProvider {
  private bonuses: Map<string, SignalPatch>;

  constructor(bonuses: Record<string, SignalPatch> = {}) {
    this.bonuses = new Map(Object.entries(bonuses));
  }

  sceneBonus(location: string, time: string): SignalPatch | null {
    return (
      this.bonuses.get(`${location}@${time}`) ??
      this.bonuses.get(location) ??
      this.bonuses.get(`@${time}`) ??
      null
    );
  }
}
