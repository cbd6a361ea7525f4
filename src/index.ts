export { DetectionCoordinator, ALL_METHODS, type CoordinatorOptions, type DetectorErrorHandler } from './core/coordinator.js';
export { readCorpus, validateCorpusText } from './core/corpus.js';
export { loadConfig, resolvePath } from './core/config.js';
export { DetectorInitError, CorpusReadError, ConfigError, AnalyzerError } from './core/errors.js';
export { PATTERN_BANK, type PatternEntry, type PatternCategory } from './detectors/patternBank.js';
export { PatternDetector } from './detectors/patternDetector.js';
export { StatisticalDetector, NER_LABELS } from './detectors/statisticalDetector.js';
export { createCompromiseEngine, type NerEngine, type EntityAnnotation } from './detectors/nerEngine.js';
export { HybridDetector, ANALYZER_ENTITIES, ANALYZER_LANGUAGE } from './detectors/hybridDetector.js';
export { PresidioClient, type AnalyzerEngine, type AnalyzerResult } from './detectors/presidioClient.js';
export { buildDetectorRegistry, DETECTOR_NAMES, type DetectorRegistry } from './detectors/registry.js';
export { formatFinding, parseFinding, sortFindings } from './detectors/finding.js';
export type { Detector, Finding, FindingSet, DetectionResults, ScreenConfig } from './types/index.js';
