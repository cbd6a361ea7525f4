/**
 * D-01: Pattern Detector
 * Hand-written regular expressions, no model involved.
 */
import type { Detector, FindingSet } from '../types/index.js';
import { PATTERN_BANK, matchAll, type PatternEntry } from './patternBank.js';
import { formatFinding } from './finding.js';

export class PatternDetector implements Detector {
  readonly name: string;
  readonly description = 'Regular-expression pattern bank (email, phone, SSN, card, passport, SIN)';
  private readonly bank: readonly PatternEntry[];

  constructor(name = 'regex', bank: readonly PatternEntry[] = PATTERN_BANK) {
    this.name = name;
    this.bank = bank;
  }

  async detect(text: string): Promise<FindingSet> {
    return this.detectSync(text);
  }

  /**
   * Every category is tried, in bank order. Overlaps across categories are
   * kept as separate findings.
   */
  detectSync(text: string): FindingSet {
    const findings: FindingSet = new Set();
    for (const entry of this.bank) {
      for (const value of matchAll(entry, text)) {
        findings.add(formatFinding(entry.category, value));
      }
    }
    return findings;
  }
}
