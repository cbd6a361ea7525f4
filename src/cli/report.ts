/**
 * Result rendering for the scan command.
 */
import type { DetectionResults } from '../types/index.js';
import { sortFindings } from '../detectors/finding.js';
import { capitalize } from './selection.js';

const RULE = '============================';

export function formatResults(results: DetectionResults): string[] {
  const lines = ['', '=== PII Detection Results ==='];

  for (const [method, findings] of results) {
    lines.push('', `${capitalize(method)} Detector:`);
    if (findings.size === 0) {
      lines.push('  No PII detected.');
      continue;
    }
    for (const finding of sortFindings(findings)) {
      lines.push(`  - ${finding}`);
    }
  }

  lines.push('', RULE);
  return lines;
}

export function printResults(results: DetectionResults): void {
  console.log(formatResults(results).join('\n'));
}

/**
 * Plain-object form for --json output. Findings are sorted.
 */
export function resultsToJson(results: DetectionResults): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [method, findings] of results) {
    out[method] = sortFindings(findings);
  }
  return out;
}
