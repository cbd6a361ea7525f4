/**
 * Tests for D-03: Hybrid Detector
 * Request shape, offset slicing (code points) and construction failures.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  HybridDetector,
  ANALYZER_ENTITIES,
  codePointsToUtf16,
} from '../../src/detectors/hybridDetector.js';
import { DetectorInitError } from '../../src/core/errors.js';
import type { AnalyzeRequest, AnalyzerResult } from '../../src/detectors/presidioClient.js';

function fakeAnalyzer(results: AnalyzerResult[]) {
  return { analyze: vi.fn(async (_request: AnalyzeRequest) => results) };
}

describe('HybridDetector', () => {
  it('should request the fixed entity set in English', async () => {
    const analyzer = fakeAnalyzer([]);
    const detector = new HybridDetector(() => analyzer);
    await detector.detect('hello');

    expect(analyzer.analyze).toHaveBeenCalledWith({
      text: 'hello',
      entities: ANALYZER_ENTITIES,
      language: 'en',
    });
    expect([...ANALYZER_ENTITIES]).toEqual([
      'PERSON', 'PHONE_NUMBER', 'EMAIL_ADDRESS', 'CREDIT_CARD', 'US_SSN', 'US_PASSPORT', 'CA_SIN',
    ]);
  });

  it('should slice the matched text from offsets', async () => {
    const text = 'Call Jane Doe at jane@example.com';
    const detector = new HybridDetector(() => fakeAnalyzer([
      { entity_type: 'PERSON', start: 5, end: 13, score: 0.85 },
      { entity_type: 'EMAIL_ADDRESS', start: 17, end: 33, score: 1 },
    ]));

    expect(await detector.detect(text)).toEqual(new Set([
      'PERSON: Jane Doe',
      'EMAIL_ADDRESS: jane@example.com',
    ]));
  });

  it('should count offsets in code points, not UTF-16 units', async () => {
    // The emoji is one code point but two UTF-16 units
    const text = '😀 Jane Doe';
    const detector = new HybridDetector(() => fakeAnalyzer([
      { entity_type: 'PERSON', start: 2, end: 10 },
    ]));

    expect(await detector.detect(text)).toEqual(new Set(['PERSON: Jane Doe']));
    expect(text.slice(2, 10)).not.toBe('Jane Doe');
  });

  it('should collapse duplicate results', async () => {
    const detector = new HybridDetector(() => fakeAnalyzer([
      { entity_type: 'US_SSN', start: 0, end: 11 },
      { entity_type: 'US_SSN', start: 0, end: 11 },
    ]));
    expect(await detector.detect('123-45-6789')).toEqual(new Set(['US_SSN: 123-45-6789']));
  });

  it('should propagate analyzer failures to the caller', async () => {
    const detector = new HybridDetector(() => ({
      analyze: vi.fn(async () => {
        throw new Error('connection refused');
      }),
    }));
    await expect(detector.detect('x')).rejects.toThrow('connection refused');
  });

  describe('construction', () => {
    it('should fail without an analyzer URL', () => {
      expect(() => HybridDetector.fromUrl(undefined)).toThrow(DetectorInitError);
      expect(() => HybridDetector.fromUrl('')).toThrow(
        'presidio detector unavailable: analyzer URL not configured (set PII_SCREEN_PRESIDIO_URL)',
      );
    });

    it('should fail on a malformed analyzer URL', () => {
      expect(() => HybridDetector.fromUrl('not a url')).toThrow(DetectorInitError);
    });

    it('should fail on a non-http analyzer URL', () => {
      expect(() => HybridDetector.fromUrl('ftp://localhost:5002')).toThrow(DetectorInitError);
    });

    it('should build from a valid URL', () => {
      const detector = HybridDetector.fromUrl('http://localhost:5002');
      expect(detector.name).toBe('presidio');
      expect(detector.description).toContain('http://localhost:5002');
    });
  });
});

describe('codePointsToUtf16', () => {
  it('should shift indices after an astral character', () => {
    const index = codePointsToUtf16('a😀bc', [3, 1, 2]);
    expect(index).toEqual(new Map([[1, 1], [2, 3], [3, 4]]));
  });

  it('should leave BMP text unchanged', () => {
    expect(codePointsToUtf16('Café', [0, 4])).toEqual(new Map([[0, 0], [4, 4]]));
  });

  it('should clamp offsets past the end', () => {
    expect(codePointsToUtf16('a😀', [99])).toEqual(new Map([[99, 3]]));
  });

  it('should only resolve the offsets asked for', () => {
    expect(codePointsToUtf16('x'.repeat(1000), [5]).size).toBe(1);
  });
});
