import { EngineConfig } from '../config';
import { SettingsProvider } from '../types/collaborators';
import { SettingsSnapshot } from '../types';

// Settings collaborator backed by the loaded config; the UI side may update it between turns
export class StaticSettingsProvider implements SettingsProvider {
  private snapshot: SettingsSnapshot;

  constructor(initial: SettingsSnapshot) {
    this.snapshot = cloneSettings(initial);
  }

  static fromConfig(config: EngineConfig, registeredSources: string[]): StaticSettingsProvider {
    return new StaticSettingsProvider({
      enabled_sources: config.enabledSources.length > 0 ? config.enabledSources : registeredSources,
      priority_order: config.priorityOrder,
      length_mode: config.lengthMode
    });
  }

  read(): SettingsSnapshot {
    return cloneSettings(this.snapshot);
  }

  update(changes: Partial<SettingsSnapshot>): void {
    this.snapshot = cloneSettings({ ...this.snapshot, ...changes });
  }
}

function cloneSettings(settings: SettingsSnapshot): SettingsSnapshot {
  return {
    enabled_sources: [...settings.enabled_sources],
    priority_order: [...settings.priority_order],
    length_mode: settings.length_mode
  };
}
