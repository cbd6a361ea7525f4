/**
 * NER engines for the statistical detector.
 * The detector only needs `annotate(text)`; the shipped engine wraps the
 * compromise English model.
 */
import nlp from 'compromise';

export interface EntityAnnotation {
  label: string;
  text: string;
}

export interface NerEngine {
  readonly model: string;
  annotate(text: string): EntityAnnotation[];
}

export type NerEngineFactory = () => NerEngine;

const EDGE_PUNCTUATION = /^[\s"'([{]+|[\s"'.,;:!?)\]}]+$/g;

export function cleanSpan(span: string): string {
  return span.replace(EDGE_PUNCTUATION, '');
}

function toStrings(out: unknown): string[] {
  if (!Array.isArray(out)) return [];
  return out.filter((v): v is string => typeof v === 'string');
}

/**
 * compromise tags people, places and organizations; they map onto the
 * PERSON / GPE / ORG labels the detector filters on.
 */
export function createCompromiseEngine(): NerEngine {
  // Probe once so lexicon problems surface at construction, not first use
  const probe = nlp('Ada Lovelace lived in London.');
  if (typeof probe.people !== 'function') {
    throw new Error('compromise build lacks the named-entity plugins');
  }

  return {
    model: 'compromise/en',
    annotate(text: string): EntityAnnotation[] {
      const doc = nlp(text);
      const groups: Array<[string, unknown]> = [
        ['PERSON', doc.people().out('array')],
        ['GPE', doc.places().out('array')],
        ['ORG', doc.organizations().out('array')],
      ];

      const annotations: EntityAnnotation[] = [];
      for (const [label, out] of groups) {
        for (const span of toStrings(out)) {
          const cleaned = cleanSpan(span);
          if (cleaned) annotations.push({ label, text: cleaned });
        }
      }
      return annotations;
    },
  };
}
