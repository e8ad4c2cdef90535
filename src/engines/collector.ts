import { SourceRegistry } from '../core/source-registry';
import { PersonaOverrideProvider } from '../types/collaborators';
import {
  Candidate,
  CandidateSet,
  CandidateSource,
  ChatMessage,
  SourceOverrideMap,
  SourceParams,
  SourceReply,
  UsageMetadata
} from '../types';
import { CompanionError, ErrorCode, describeError, errorTrace } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';

export const COLLECTOR_DIAGNOSTIC_NAME = '__collector__';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_CONCURRENCY = 4;
const DISABLED_REASON = 'disabled_by_config_or_mode';

export interface CollectorOptions {
  timeoutMs?: number;
  maxConcurrency?: number;
  personaOverrides?: PersonaOverrideProvider;
  logger?: Logger;
}

export interface CollectRequest {
  messages: ChatMessage[];
  enabledSources: string[];
  perSourceOverrides?: SourceOverrideMap;
  // Added under every source's own overrides (turn mode, emotion bias)
  commonParams?: SourceParams;
  signal?: AbortSignal;
}

/**
 * Fans one message list out to every registered source and turns each
 * outcome into a Candidate. Nothing a source does escapes as an exception.
 */
export class CandidateCollector {
  private registry: SourceRegistry;
  private timeoutMs: number;
  private maxConcurrency: number;
  private personaOverrides?: PersonaOverrideProvider;
  private logger: Logger;

  constructor(registry: SourceRegistry, options: CollectorOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.personaOverrides = options.personaOverrides;
    this.logger = options.logger ?? createLogger('collector');
  }

  async collect(request: CollectRequest): Promise<CandidateSet> {
    const enabled = unique(request.enabledSources);

    if (enabled.length === 0) {
      this.logger.warn('No sources enabled for this turn');
      return {
        [COLLECTOR_DIAGNOSTIC_NAME]: errorCandidate(
          COLLECTOR_DIAGNOSTIC_NAME,
          'no_sources_enabled',
          'No candidate sources were enabled for this turn'
        )
      };
    }

    const enabledSet = new Set(enabled);
    const results = new Map<string, Candidate>();

    // Registered but not enabled: kept for auditability
    for (const source of this.registry.all()) {
      if (!enabledSet.has(source.name)) {
        results.set(source.name, {
          source_name: source.name,
          status: 'disabled',
          text: '',
          usage: null,
          error_code: 'disabled_by_config',
          error_message: DISABLED_REASON
        });
      }
    }

    const calls = await this.runPool(enabled, name => this.collectOne(name, request));
    calls.forEach(candidate => results.set(candidate.source_name, candidate));

    // Enabled sources first, in request order, then the disabled ones
    const ordered: Record<string, Candidate> = {};
    for (const name of enabled) {
      const candidate = results.get(name);
      if (candidate) ordered[name] = candidate;
    }
    results.forEach((candidate, name) => {
      if (!(name in ordered)) ordered[name] = candidate;
    });

    this.logger.debug(
      { sources: Object.values(ordered).map(c => `${c.source_name}:${c.status}`) },
      'Candidates collected'
    );
    return ordered;
  }

  resolveParams(source: CandidateSource, request: CollectRequest): SourceParams {
    const overrides = request.perSourceOverrides ?? {};
    const specific = overrides[source.name] ?? overrides[source.family] ?? {};
    const defaults = this.personaOverrides?.lookupDefaults(source.name) ?? {};

    return { ...defaults, ...specific, ...(request.commonParams ?? {}) };
  }

  private async collectOne(name: string, request: CollectRequest): Promise<Candidate> {
    const source = this.registry.get(name);
    if (!source) {
      return errorCandidate(name, 'source_not_registered', `Source "${name}" is not registered`);
    }

    const startedAt = Date.now();
    try {
      const params = this.resolveParams(source, request);
      const reply = await this.callWithTimeout(source, request.messages, params, request.signal);
      const [text, usage] = reply;

      if (text.trim().length === 0) {
        throw new CompanionError('empty_response', `Source "${name}" returned an empty reply`);
      }

      return {
        source_name: name,
        status: 'ok',
        text,
        usage,
        elapsed_ms: Date.now() - startedAt
      };
    } catch (error) {
      const code: ErrorCode = error instanceof CompanionError ? error.code : 'source_call_failed';
      this.logger.warn({ source: name, code, err: describeError(error) }, 'Source call failed');
      return {
        ...errorCandidate(name, code, describeError(error)),
        trace: errorTrace(error),
        elapsed_ms: Date.now() - startedAt
      };
    }
  }

  private async callWithTimeout(
    source: CandidateSource,
    messages: ChatMessage[],
    params: SourceParams,
    signal?: AbortSignal
  ): Promise<SourceReply> {
    if (signal?.aborted) {
      throw new CompanionError('source_aborted', `Turn aborted before "${source.name}" was called`);
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    let timeoutId: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        // Reject before aborting so the timeout wins the race over the source's own abort error
        reject(new CompanionError('source_timeout', `Source "${source.name}" timed out after ${this.timeoutMs}ms`));
        controller.abort('timeout');
      }, this.timeoutMs);
    });
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          if (signal?.aborted) {
            reject(new CompanionError('source_aborted', `Call to "${source.name}" was cancelled`));
          }
        },
        { once: true }
      );
    });
    // The losing branches of the race must not surface as unhandled rejections
    deadline.catch(() => undefined);
    aborted.catch(() => undefined);

    try {
      const raw: unknown = await Promise.race([
        source.call(messages, params, controller.signal),
        deadline,
        aborted
      ]);
      return validateReply(source.name, raw);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  // Bounded worker pool; results come back in input order
  private async runPool<T>(names: string[], worker: (name: string) => Promise<T>): Promise<T[]> {
    const results: T[] = new Array(names.length);
    let next = 0;

    const lanes = Array.from({ length: Math.min(this.maxConcurrency, names.length) }, async () => {
      while (next < names.length) {
        const index = next++;
        results[index] = await worker(names[index]);
      }
    });

    await Promise.all(lanes);
    return results;
  }
}

function validateReply(sourceName: string, raw: unknown): SourceReply {
  if (!Array.isArray(raw) || raw.length < 1 || typeof raw[0] !== 'string') {
    throw new CompanionError(
      'malformed_response',
      `Source "${sourceName}" returned ${describeError(raw)} instead of [text, usage]`
    );
  }

  const usage: unknown = raw[1];
  return [raw[0], isUsage(usage) ? usage : null];
}

function isUsage(value: unknown): value is UsageMetadata {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(entry => typeof entry === 'number');
}

function errorCandidate(name: string, code: ErrorCode, message: string): Candidate {
  return {
    source_name: name,
    status: 'error',
    text: '',
    usage: null,
    error_code: code,
    error_message: message
  };
}

function unique(names: string[]): string[] {
  return Array.from(new Set(names));
}
