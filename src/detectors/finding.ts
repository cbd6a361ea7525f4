import type { Finding } from '../types/index.js';

const SEPARATOR = ': ';

export function formatFinding(category: string, value: string): Finding {
  return `${category}${SEPARATOR}${value}`;
}

/**
 * Split a finding back into its parts. Categories never contain ': ',
 * values may, so the split is on the first separator only.
 */
export function parseFinding(finding: Finding): { category: string; value: string } {
  const idx = finding.indexOf(SEPARATOR);
  if (idx === -1) return { category: finding, value: '' };
  return { category: finding.slice(0, idx), value: finding.slice(idx + SEPARATOR.length) };
}

export function sortFindings(findings: Iterable<Finding>): Finding[] {
  return [...findings].sort();
}
