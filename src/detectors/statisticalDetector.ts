/**
 * D-02: Statistical Detector
 * Named-entity recognition, filtered to person / place / organization.
 */
import type { Detector, FindingSet } from '../types/index.js';
import { DetectorInitError } from '../core/errors.js';
import { formatFinding } from './finding.js';
import { createCompromiseEngine, type NerEngine, type NerEngineFactory } from './nerEngine.js';

export const NER_LABELS: ReadonlySet<string> = new Set(['PERSON', 'GPE', 'ORG']);

export class StatisticalDetector implements Detector {
  readonly name: string;
  readonly description: string;
  private readonly engine: NerEngine;

  /**
   * Loads the engine eagerly; a missing model is a DetectorInitError here
   * rather than a failure on the first detect() call.
   */
  constructor(factory: NerEngineFactory = createCompromiseEngine, name = 'ner') {
    this.name = name;
    try {
      this.engine = factory();
    } catch (err) {
      throw new DetectorInitError(name, 'NER model could not be loaded', err);
    }
    this.description = `Named-entity recognition (${this.engine.model}): PERSON, GPE, ORG`;
  }

  async detect(text: string): Promise<FindingSet> {
    const findings: FindingSet = new Set();
    for (const ent of this.engine.annotate(text)) {
      if (NER_LABELS.has(ent.label)) {
        findings.add(formatFinding(ent.label, ent.text));
      }
    }
    return findings;
  }
}
