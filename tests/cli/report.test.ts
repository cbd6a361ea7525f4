import { describe, it, expect } from 'vitest';
import { formatResults, resultsToJson } from '../../src/cli/report.js';
import type { DetectionResults } from '../../src/types/index.js';

const results: DetectionResults = new Map([
  ['regex', new Set(['SSN: 123-45-6789', 'Email: jane.doe@example.com'])],
  ['presidio', new Set<string>()],
]);

describe('formatResults', () => {
  it('should print one sorted block per method', () => {
    expect(formatResults(results)).toEqual([
      '',
      '=== PII Detection Results ===',
      '',
      'Regex Detector:',
      '  - Email: jane.doe@example.com',
      '  - SSN: 123-45-6789',
      '',
      'Presidio Detector:',
      '  No PII detected.',
      '',
      '============================',
    ]);
  });

  it('should print only the frame for no methods', () => {
    expect(formatResults(new Map())).toEqual(['', '=== PII Detection Results ===', '', '============================']);
  });
});

describe('resultsToJson', () => {
  it('should give sorted arrays per method', () => {
    expect(resultsToJson(results)).toEqual({
      regex: ['Email: jane.doe@example.com', 'SSN: 123-45-6789'],
      presidio: [],
    });
  });
});
