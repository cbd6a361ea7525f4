/**
 * D-03: Hybrid Detector
 * Rule + model analyzer (Presidio). The analyzer returns offsets only, so
 * the matched text is cut back out of the input here.
 */
import type { Detector, FindingSet } from '../types/index.js';
import { DetectorInitError } from '../core/errors.js';
import { formatFinding } from './finding.js';
import { PresidioClient, type AnalyzerEngine, type PresidioClientOptions } from './presidioClient.js';

export const ANALYZER_ENTITIES = [
  'PERSON',
  'PHONE_NUMBER',
  'EMAIL_ADDRESS',
  'CREDIT_CARD',
  'US_SSN',
  'US_PASSPORT',
  'CA_SIN',
] as const;

export const ANALYZER_LANGUAGE = 'en';

/**
 * Map code point offsets to UTF-16 indices in one walk over the text, stopping
 * at the largest offset asked for. The analyzer counts code points, so a plain
 * UTF-16 slice would drift after any astral character (emoji, some CJK).
 * Offsets past the end map to `text.length`.
 */
export function codePointsToUtf16(text: string, offsets: Iterable<number>): Map<number, number> {
  const wanted = [...new Set(offsets)].sort((a, b) => a - b);
  const index = new Map<number, number>();
  let codePoint = 0;
  let unit = 0;

  for (const offset of wanted) {
    while (codePoint < offset && unit < text.length) {
      unit += (text.codePointAt(unit) ?? 0) > 0xffff ? 2 : 1;
      codePoint++;
    }
    index.set(offset, unit);
  }
  return index;
}

export type AnalyzerEngineFactory = () => AnalyzerEngine;

export class HybridDetector implements Detector {
  readonly name: string;
  readonly description: string;
  private readonly analyzer: AnalyzerEngine;

  constructor(factory: AnalyzerEngineFactory, name = 'presidio', description = 'Presidio analyzer (rules + NER)') {
    this.name = name;
    this.description = description;
    try {
      this.analyzer = factory();
    } catch (err) {
      throw new DetectorInitError(name, 'analyzer could not be created', err);
    }
  }

  /**
   * Build a detector that talks to a Presidio service. A missing URL fails
   * construction.
   */
  static fromUrl(url: string | undefined, opts: Omit<PresidioClientOptions, 'url'> = {}, name = 'presidio'): HybridDetector {
    if (!url) {
      throw new DetectorInitError(name, 'analyzer URL not configured (set PII_SCREEN_PRESIDIO_URL)');
    }
    return new HybridDetector(
      () => new PresidioClient({ url, ...opts }),
      name,
      `Presidio analyzer at ${url} (rules + NER)`,
    );
  }

  async detect(text: string): Promise<FindingSet> {
    const results = await this.analyzer.analyze({
      text,
      entities: ANALYZER_ENTITIES,
      language: ANALYZER_LANGUAGE,
    });

    const findings: FindingSet = new Set();
    if (results.length === 0) return findings;

    const index = codePointsToUtf16(text, results.flatMap(r => [r.start, r.end]));
    for (const result of results) {
      const start = index.get(result.start) ?? text.length;
      const end = index.get(result.end) ?? text.length;
      findings.add(formatFinding(result.entity_type, text.slice(start, end)));
    }
    return findings;
  }
}
