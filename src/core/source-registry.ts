import { CandidateSource } from '../types';
import { CompanionError } from '../utils/errors';

export class SourceRegistry {
  private sources: Map<string, CandidateSource> = new Map();

  register(source: CandidateSource): this {
    if (this.sources.has(source.name)) {
      throw new CompanionError('config_invalid', `Source "${source.name}" is already registered`);
    }
    this.sources.set(source.name, source);
    return this;
  }

  get(name: string): CandidateSource | undefined {
    return this.sources.get(name);
  }

  names(): string[] {
    return Array.from(this.sources.keys());
  }

  all(): CandidateSource[] {
    return Array.from(this.sources.values());
  }

  shouldAnswer(source: CandidateSource, mode: string): boolean {
    if (!source.enabled) return false;
    if (source.modes.length === 0) return true;

    const modes = source.modes.map(m => m.toLowerCase());
    return modes.includes('all') || modes.includes(mode.toLowerCase());
  }

  // Names that should answer this turn, in registration order
  enabledFor(mode: string, allowList?: string[]): string[] {
    const allowed = allowList ? new Set(allowList) : null;
    const registered = this.all()
      .filter(source => !allowed || allowed.has(source.name))
      .filter(source => this.shouldAnswer(source, mode))
      .map(source => source.name);

    // Allow-listed names nobody registered still reach the collector so they show up as errors
    const unknown = allowList ? allowList.filter(name => !this.sources.has(name)) : [];
    return [...registered, ...unknown];
  }
}
