/**
 * Error types surfaced by the screening pipeline.
 * Per-call detector errors stay inside the coordinator; these are the ones
 * that reach the CLI.
 */

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A detector could not be constructed (model missing, endpoint unset).
 */
export class DetectorInitError extends Error {
  readonly detector: string;

  constructor(detector: string, message: string, cause?: unknown) {
    super(
      cause === undefined
        ? `${detector} detector unavailable: ${message}`
        : `${detector} detector unavailable: ${message} (${describe(cause)})`,
      { cause },
    );
    this.name = 'DetectorInitError';
    this.detector = detector;
  }
}

/**
 * The input corpus is missing, unreadable or unusable. Fatal to a run.
 */
export class CorpusReadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`Cannot read corpus '${path}': ${message}`, { cause });
    this.name = 'CorpusReadError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`Invalid config at ${path}: ${message}`, { cause });
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * The analyzer service answered with an error status or a payload we could
 * not validate, or did not answer in time.
 */
export class AnalyzerError extends Error {
  readonly status?: number;

  constructor(message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = 'AnalyzerError';
    this.status = opts?.status;
  }
}

export function errorMessage(err: unknown): string {
  return describe(err);
}
