/**
 * Detection Coordinator
 * Runs a selected subset of the registered detectors over one text.
 * A detector that throws gets an empty result; the others still run.
 */
import { randomUUID } from 'node:crypto';
import type { Detector, DetectionResults, FindingSet } from '../types/index.js';
import { auditError, auditInfo } from '../security/auditLogger.js';
import { errorMessage } from './errors.js';

export const ALL_METHODS = 'all';

export type DetectorErrorHandler = (name: string, error: unknown) => void;

export interface CoordinatorOptions {
  /** Called once per detector failure, after it has been audited. */
  onDetectorError?: DetectorErrorHandler;
}

export class DetectionCoordinator {
  private readonly detectors: ReadonlyMap<string, Detector>;
  private readonly onDetectorError?: DetectorErrorHandler;

  constructor(detectors: ReadonlyMap<string, Detector>, opts: CoordinatorOptions = {}) {
    this.detectors = new Map(detectors);
    this.onDetectorError = opts.onDetectorError;
  }

  /** Registered names, in registration order. */
  get methods(): string[] {
    return [...this.detectors.keys()];
  }

  has(name: string): boolean {
    return this.detectors.has(name);
  }

  describe(name: string): string | undefined {
    return this.detectors.get(name)?.description;
  }

  /**
   * Replace `all` with every registered name and drop repeats.
   * Unknown names pass through untouched; run() ignores them.
   */
  expandSelection(names: readonly string[]): string[] {
    const expanded: string[] = [];
    for (const name of names) {
      const batch = name.toLowerCase() === ALL_METHODS ? this.methods : [name];
      for (const n of batch) {
        if (!expanded.includes(n)) expanded.push(n);
      }
    }
    return expanded;
  }

  /**
   * Run each selected, registered detector in order.
   * Never rejects because of a detector.
   */
  async run(text: string, selected: readonly string[]): Promise<DetectionResults> {
    const runId = randomUUID();
    const results: DetectionResults = new Map();

    for (const name of this.expandSelection(selected)) {
      const detector = this.detectors.get(name);
      if (!detector || results.has(name)) continue;
      results.set(name, await this.runOne(detector, text, runId));
    }

    auditInfo('detection_run_completed', {
      runId,
      details: {
        textLength: text.length,
        methods: [...results.keys()],
        counts: Object.fromEntries([...results].map(([n, f]) => [n, f.size])),
      },
    });

    return results;
  }

  private async runOne(detector: Detector, text: string, runId: string): Promise<FindingSet> {
    try {
      return await detector.detect(text);
    } catch (err) {
      auditError('detector_failed', {
        method: detector.name,
        runId,
        details: { error: errorMessage(err) },
      });
      this.notifyError(detector.name, err, runId);
      return new Set();
    }
  }

  /** A throwing handler is audited and dropped; the run carries on. */
  private notifyError(name: string, err: unknown, runId: string): void {
    if (!this.onDetectorError) return;
    try {
      this.onDetectorError(name, err);
    } catch (handlerErr) {
      auditError('detector_error_handler_failed', {
        method: name,
        runId,
        details: { error: errorMessage(handlerErr) },
      });
    }
  }
}
