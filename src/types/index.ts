import { z } from 'zod';

// ── Detector Configs ─────────────────────────────────────────

export const RegexDetectorConfigSchema = z.object({
  enabled: z.boolean().default(true),
});
export type RegexDetectorConfig = z.infer<typeof RegexDetectorConfigSchema>;

export const NerDetectorConfigSchema = z.object({
  enabled: z.boolean().default(true),
});
export type NerDetectorConfig = z.infer<typeof NerDetectorConfigSchema>;

export const PresidioDetectorConfigSchema = z.object({
  enabled: z.boolean().default(true),
  analyzerUrl: z.string().url().optional(),
  analyzerUrlEnv: z.string().default('PII_SCREEN_PRESIDIO_URL'),
  timeoutMs: z.number().int().positive().default(10_000),
  scoreThreshold: z.number().min(0).max(1).optional(),
});
export type PresidioDetectorConfig = z.infer<typeof PresidioDetectorConfigSchema>;

export const DetectorsConfigSchema = z.object({
  failOnInitError: z.boolean().default(false),
  regex: RegexDetectorConfigSchema.default(() => ({ enabled: true })),
  ner: NerDetectorConfigSchema.default(() => ({ enabled: true })),
  presidio: PresidioDetectorConfigSchema.default(() => ({
    enabled: true,
    analyzerUrlEnv: 'PII_SCREEN_PRESIDIO_URL',
    timeoutMs: 10_000,
  })),
});
export type DetectorsConfig = z.infer<typeof DetectorsConfigSchema>;

// ── Corpus & Audit Configs ───────────────────────────────────

export const CorpusConfigSchema = z.object({
  path: z.string().default('input_corpus.txt'),
  maxBytes: z.number().int().positive().default(50 * 1024 * 1024),
});
export type CorpusConfig = z.infer<typeof CorpusConfigSchema>;

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(true),
  logPath: z.string().default('~/.pii-screen/audit.jsonl'),
});
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

// ── Main Config ──────────────────────────────────────────────

export const ScreenConfigSchema = z.object({
  name: z.string().default('pii-screen'),
  version: z.string().default('1.0.0'),
  corpus: CorpusConfigSchema.default(() => ({
    path: 'input_corpus.txt',
    maxBytes: 50 * 1024 * 1024,
  })),
  detectors: DetectorsConfigSchema.default(() => ({
    failOnInitError: false,
    regex: { enabled: true },
    ner: { enabled: true },
    presidio: {
      enabled: true,
      analyzerUrlEnv: 'PII_SCREEN_PRESIDIO_URL',
      timeoutMs: 10_000,
    },
  })),
  audit: AuditConfigSchema.default(() => ({
    enabled: true,
    logPath: '~/.pii-screen/audit.jsonl',
  })),
});
export type ScreenConfig = z.infer<typeof ScreenConfigSchema>;

// ── Detection Types ──────────────────────────────────────────

/**
 * A finding is stored as `"<category>: <value>"` so a plain Set dedupes it.
 */
export type Finding = string;

export type FindingSet = Set<Finding>;

/** Detector name → findings, in selection order. */
export type DetectionResults = Map<string, FindingSet>;

export interface Detector {
  readonly name: string;
  readonly description: string;
  detect(text: string): Promise<FindingSet>;
}

export interface UnavailableDetector {
  name: string;
  reason: string;
}

// ── Audit Types ──────────────────────────────────────────────

export type AuditSeverity = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface AuditEntry {
  timestamp: string;
  severity: AuditSeverity;
  event: string;
  method?: string;
  runId?: string;
  details?: Record<string, unknown>;
}

// ── Health Check Types ───────────────────────────────────────

export type HealthCheckStatus = 'PASS' | 'FAIL' | 'WARN' | 'SKIP';

export interface HealthCheckResult {
  id: string;
  name: string;
  status: HealthCheckStatus;
  message: string;
}
