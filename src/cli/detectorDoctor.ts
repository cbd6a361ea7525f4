/**
 * Detector Doctor
 * Health checks for configuration, each detector backend, audit log and
 * the default corpus.
 */
import { existsSync } from 'node:fs';
import type { ScreenConfig, HealthCheckResult, HealthCheckStatus } from '../types/index.js';
import { resolvePath } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { PATTERN_BANK } from '../detectors/patternBank.js';
import { PatternDetector } from '../detectors/patternDetector.js';
import { StatisticalDetector } from '../detectors/statisticalDetector.js';
import { PresidioClient } from '../detectors/presidioClient.js';
import type { NerEngineFactory } from '../detectors/nerEngine.js';

export interface DoctorContext {
  configPath: string;
  /** Injected in tests; defaults to the compromise engine. */
  nerFactory?: NerEngineFactory;
}

type Check = (config: ScreenConfig, ctx: DoctorContext) => Promise<HealthCheckResult>;

const NER_PROBE = 'Ada Lovelace met Charles Babbage in London.';
const PATTERN_PROBE = 'Reach the probe at probe@example.com or 555-010-0199.';

const checks: Check[] = [
  // C-01: Config file
  async (_c, ctx) => {
    const found = existsSync(ctx.configPath);
    return result('C-01', 'Config', found ? 'PASS' : 'WARN', found ? `Loaded ${ctx.configPath}` : 'No config file, using defaults');
  },

  // D-01: Pattern bank
  async (c) => {
    if (!c.detectors.regex.enabled) return result('D-01', 'Pattern Detector', 'SKIP', 'Disabled in config');
    const findings = new PatternDetector().detectSync(PATTERN_PROBE);
    const ok = findings.has('Email: probe@example.com') && findings.has('Phone: 555-010-0199');
    return result('D-01', 'Pattern Detector', ok ? 'PASS' : 'FAIL', ok ? `${PATTERN_BANK.length} categories` : 'Probe text not matched');
  },

  // D-02: NER engine
  async (c, ctx) => {
    if (!c.detectors.ner.enabled) return result('D-02', 'NER Detector', 'SKIP', 'Disabled in config');
    try {
      const detector = new StatisticalDetector(ctx.nerFactory);
      const findings = await detector.detect(NER_PROBE);
      return findings.size > 0
        ? result('D-02', 'NER Detector', 'PASS', `${findings.size} entities in probe text`)
        : result('D-02', 'NER Detector', 'WARN', 'Model loaded but found nothing in probe text');
    } catch (err) {
      return result('D-02', 'NER Detector', 'FAIL', errorMessage(err));
    }
  },

  // D-03: Analyzer endpoint
  async (c) => {
    const p = c.detectors.presidio;
    if (!p.enabled) return result('D-03', 'Presidio Analyzer', 'SKIP', 'Disabled in config');
    if (!p.analyzerUrl) return result('D-03', 'Presidio Analyzer', 'WARN', `Not configured (set ${p.analyzerUrlEnv})`);
    try {
      const healthy = await new PresidioClient({ url: p.analyzerUrl, timeoutMs: p.timeoutMs }).health();
      return result('D-03', 'Presidio Analyzer', healthy ? 'PASS' : 'FAIL', healthy ? `Healthy at ${p.analyzerUrl}` : `Unhealthy at ${p.analyzerUrl}`);
    } catch (err) {
      return result('D-03', 'Presidio Analyzer', 'FAIL', errorMessage(err));
    }
  },

  // A-01: Audit log
  async (c) => {
    if (!c.audit.enabled) return result('A-01', 'Audit Logger', 'WARN', 'Disabled');
    return result('A-01', 'Audit Logger', 'PASS', `Logging to ${resolvePath(c.audit.logPath)}`);
  },

  // I-01: Default corpus
  async (c) => {
    const path = resolvePath(c.corpus.path);
    return existsSync(path)
      ? result('I-01', 'Default Corpus', 'PASS', path)
      : result('I-01', 'Default Corpus', 'WARN', `${path} not found (pass a file to scan)`);
  },
];

function result(id: string, name: string, status: HealthCheckStatus, message: string): HealthCheckResult {
  return { id, name, status, message };
}

export async function runDetectorDoctor(config: ScreenConfig, ctx: DoctorContext): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];
  for (const check of checks) {
    results.push(await check(config, ctx));
  }
  return results;
}

export function printDoctorResults(results: HealthCheckResult[]): void {
  const pass = results.filter(r => r.status === 'PASS').length;
  const warn = results.filter(r => r.status === 'WARN').length;
  const fail = results.filter(r => r.status === 'FAIL').length;
  const skip = results.filter(r => r.status === 'SKIP').length;

  console.log('\n  pii-screen Doctor\n');
  console.log('  ─────────────────────────────────────────\n');

  for (const r of results) {
    const icon = r.status === 'PASS' ? '\x1b[32m✓\x1b[0m'
      : r.status === 'WARN' ? '\x1b[33m!\x1b[0m'
      : r.status === 'FAIL' ? '\x1b[31m✗\x1b[0m'
      : '\x1b[90m-\x1b[0m';
    const statusColor = r.status === 'PASS' ? '\x1b[32m'
      : r.status === 'WARN' ? '\x1b[33m'
      : r.status === 'FAIL' ? '\x1b[31m'
      : '\x1b[90m';
    console.log(`  ${icon} ${r.id} ${r.name.padEnd(18)} ${statusColor}${r.status.padEnd(4)}\x1b[0m ${r.message}`);
  }

  console.log('\n  ─────────────────────────────────────────');
  console.log(`  Results: \x1b[32m${pass} PASS\x1b[0m  \x1b[33m${warn} WARN\x1b[0m  \x1b[31m${fail} FAIL\x1b[0m  \x1b[90m${skip} SKIP\x1b[0m\n`);
}
