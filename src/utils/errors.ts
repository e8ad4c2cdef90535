export type ErrorCode =
  | 'disabled_by_config'
  | 'source_not_registered'
  | 'source_call_failed'
  | 'collector_failed'
  | 'source_timeout'
  | 'source_aborted'
  | 'empty_response'
  | 'malformed_response'
  | 'no_sources_enabled'
  | 'no_usable_candidate'
  | 'selection_exception'
  | 'compose_exception'
  | 'fusion_failed'
  | 'scene_lookup_failed'
  | 'settings_sync_failed'
  | 'state_read_failed'
  | 'emotion_analysis_failed'
  | 'emotion_sync_failed'
  | 'config_invalid';

export const MAX_TRACE_CHARS = 2000;

export class CompanionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompanionError';
    this.code = code;
  }
}

export class ConfigError extends CompanionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config_invalid', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface StageError {
  code: ErrorCode;
  message: string;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StageError };

export function truncate(text: string, max: number = MAX_TRACE_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return truncate(`${error.name}: ${error.message}`);
  }
  if (typeof error === 'string') {
    return truncate(error);
  }
  try {
    return truncate(JSON.stringify(error) ?? String(error));
  } catch {
    return truncate(String(error));
  }
}

export function errorTrace(error: unknown): string | undefined {
  return error instanceof Error && error.stack ? truncate(error.stack) : undefined;
}

export function toStageError(error: unknown, fallback: ErrorCode): StageError {
  return {
    code: error instanceof CompanionError ? error.code : fallback,
    message: describeError(error)
  };
}

// Converts anything thrown by `task` into a failed StageResult
export async function runStage<T>(
  fallback: ErrorCode,
  task: () => T | Promise<T>
): Promise<StageResult<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (error) {
    return { ok: false, error: toStageError(error, fallback) };
  }
}
