/**
 * Tests for method selection: prompt parsing, --methods and the interactive loop.
 */
import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import {
  parseSelection,
  parseMethodsFlag,
  formatMenu,
  promptForMethods,
  INVALID_INPUT,
  INVALID_NUMBER,
} from '../../src/cli/selection.js';

const available = ['regex', 'ner', 'presidio'];

describe('parseSelection', () => {
  it('should select everything for all', () => {
    expect(parseSelection('all', available)).toEqual({ ok: true, methods: available });
    expect(parseSelection('  ALL ', available)).toEqual({ ok: true, methods: available });
  });

  it('should map 1-based numbers to names', () => {
    expect(parseSelection('1 3', available)).toEqual({ ok: true, methods: ['regex', 'presidio'] });
  });

  it('should accept names and commas', () => {
    expect(parseSelection('ner, regex', available)).toEqual({ ok: true, methods: ['ner', 'regex'] });
  });

  it('should drop repeated picks', () => {
    expect(parseSelection('2 2 ner', available)).toEqual({ ok: true, methods: ['ner'] });
  });

  it('should select nothing for empty input', () => {
    expect(parseSelection('   ', available)).toEqual({ ok: true, methods: [] });
  });

  it('should reject out-of-range numbers', () => {
    expect(parseSelection('0', available)).toEqual({ ok: false, error: INVALID_NUMBER });
    expect(parseSelection('1 4', available)).toEqual({ ok: false, error: INVALID_NUMBER });
  });

  it('should reject anything else', () => {
    expect(parseSelection('1 two', available)).toEqual({ ok: false, error: INVALID_INPUT });
  });
});

describe('parseMethodsFlag', () => {
  it('should split known and unknown names', () => {
    expect(parseMethodsFlag('regex,Presidio,bert', ['regex', 'ner'])).toEqual({
      methods: ['regex'],
      unknown: ['presidio', 'bert'],
    });
  });

  it('should expand all and skip blanks', () => {
    expect(parseMethodsFlag('ner,,all', available)).toEqual({
      methods: ['ner', 'regex', 'presidio'],
      unknown: [],
    });
  });
});

describe('formatMenu', () => {
  it('should number the methods', () => {
    expect(formatMenu(['regex', 'ner']).split('\n')).toEqual([
      '',
      'Select PII Detection Methods (like checkboxes):',
      '1. Regex',
      '2. Ner',
      "Enter the numbers of the methods to use (e.g., '1 2' or '1 3'), or 'all':",
    ]);
  });
});

/**
 * Feed one answer per prompt. Answers are written only once the matching
 * prompt has appeared, since readline drops lines nobody asked for.
 * Running out of answers closes the input.
 */
function scriptedIo(answers: string[]) {
  const input = new PassThrough();
  const output = new PassThrough();
  let transcript = '';
  let answered = 0;

  output.on('data', (chunk: Buffer) => {
    transcript += chunk.toString('utf-8');
    const prompts = transcript.split('> ').length - 1;
    while (answered < prompts) {
      const answer = answers[answered++];
      setImmediate(() => {
        if (answer === undefined) input.end();
        else input.write(`${answer}\n`);
      });
    }
  });

  return { io: { input, output }, transcript: () => transcript };
}

describe('promptForMethods', () => {
  it('should return the first valid answer', async () => {
    const { io, transcript } = scriptedIo(['1 2']);
    await expect(promptForMethods(available, io)).resolves.toEqual(['regex', 'ner']);
    expect(transcript()).toContain('Select PII Detection Methods (like checkboxes):');
  });

  it('should ask again after an invalid answer', async () => {
    const { io, transcript } = scriptedIo(['9', 'nope', 'all']);
    await expect(promptForMethods(available, io)).resolves.toEqual(available);
    expect(transcript()).toContain(INVALID_NUMBER);
    expect(transcript()).toContain(INVALID_INPUT);
  });

  it('should select nothing when input closes', async () => {
    const { io } = scriptedIo([]);
    await expect(promptForMethods(available, io)).resolves.toEqual([]);
  });
});
