/**
 * Detector Registry
 * Builds the named detectors once at startup. A detector that cannot be
 * constructed is left out and reported as unavailable.
 */
import type { Detector, DetectorsConfig, UnavailableDetector } from '../types/index.js';
import { DetectorInitError, errorMessage } from '../core/errors.js';
import { auditInfo, auditWarn } from '../security/auditLogger.js';
import { PatternDetector } from './patternDetector.js';
import { StatisticalDetector } from './statisticalDetector.js';
import { HybridDetector } from './hybridDetector.js';

export const DETECTOR_NAMES = ['regex', 'ner', 'presidio'] as const;
export type DetectorName = typeof DETECTOR_NAMES[number];

export type DetectorFactories = Partial<Record<DetectorName, () => Detector>>;

export interface DetectorRegistry {
  detectors: ReadonlyMap<string, Detector>;
  unavailable: UnavailableDetector[];
}

function defaultFactories(config: DetectorsConfig): Record<DetectorName, () => Detector> {
  return {
    regex: () => new PatternDetector(),
    ner: () => new StatisticalDetector(),
    presidio: () => HybridDetector.fromUrl(config.presidio.analyzerUrl, {
      timeoutMs: config.presidio.timeoutMs,
      scoreThreshold: config.presidio.scoreThreshold,
    }),
  };
}

/**
 * Construct every enabled detector in registration order.
 * With `failOnInitError` the first construction failure aborts the build.
 */
export function buildDetectorRegistry(
  config: DetectorsConfig,
  overrides: DetectorFactories = {},
): DetectorRegistry {
  const defaults = defaultFactories(config);
  const detectors = new Map<string, Detector>();
  const unavailable: UnavailableDetector[] = [];

  for (const name of DETECTOR_NAMES) {
    if (!config[name].enabled) continue;

    const factory = overrides[name] ?? defaults[name];
    try {
      detectors.set(name, factory());
    } catch (err) {
      const initErr = err instanceof DetectorInitError
        ? err
        : new DetectorInitError(name, 'construction failed', err);
      if (config.failOnInitError) throw initErr;

      unavailable.push({ name, reason: errorMessage(initErr) });
      auditWarn('detector_unavailable', { method: name, details: { reason: initErr.message } });
    }
  }

  auditInfo('detector_registry_built', {
    details: { registered: [...detectors.keys()], unavailable: unavailable.map(u => u.name) },
  });

  return { detectors, unavailable };
}
