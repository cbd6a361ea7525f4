/**
 * Tests for the Corpus Reader
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readCorpus, validateCorpusText } from '../../src/core/corpus.js';
import { CorpusReadError } from '../../src/core/errors.js';

const limits = { maxBytes: 1024 };

describe('readCorpus', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'pii-screen-corpus-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return the file as UTF-8 text', () => {
    const path = join(tmpDir, 'input_corpus.txt');
    writeFileSync(path, 'Contact me at jane.doe@example.com\nCafé ☕\n', 'utf-8');
    expect(readCorpus(path, limits)).toBe('Contact me at jane.doe@example.com\nCafé ☕\n');
  });

  it('should fail on a missing file', () => {
    const path = join(tmpDir, 'missing.txt');
    expect(() => readCorpus(path, limits)).toThrow(`Cannot read corpus '${path}': file not found`);
  });

  it('should fail on a directory', () => {
    expect(() => readCorpus(tmpDir, limits)).toThrow(`Cannot read corpus '${tmpDir}': not a regular file`);
  });

  it('should fail on a file over the size limit', () => {
    const path = join(tmpDir, 'big.txt');
    writeFileSync(path, 'x'.repeat(20));
    expect(() => readCorpus(path, { maxBytes: 10 })).toThrow('file is 20 bytes (max 10)');
  });

  it('should fail on an empty file', () => {
    const path = join(tmpDir, 'empty.txt');
    writeFileSync(path, '  \n');
    expect(() => readCorpus(path, limits)).toThrow(CorpusReadError);
    expect(() => readCorpus(path, limits)).toThrow('corpus is empty');
  });

  it('should carry the path on the error', () => {
    const path = join(tmpDir, 'missing.txt');
    try {
      readCorpus(path, limits);
      expect.unreachable('readCorpus should have thrown');
    } catch (err) {
      if (!(err instanceof CorpusReadError)) throw err;
      expect(err.path).toBe(path);
    }
  });
});

describe('validateCorpusText', () => {
  it('should accept ordinary text', () => {
    expect(validateCorpusText('hello')).toEqual({ valid: true, errors: [] });
  });

  it('should reject whitespace-only text', () => {
    expect(validateCorpusText(' \t\n')).toEqual({ valid: false, errors: ['corpus is empty'] });
  });

  it('should reject null bytes', () => {
    expect(validateCorpusText('ab\0cd')).toEqual({
      valid: false,
      errors: ['corpus contains null bytes (binary file?)'],
    });
  });
});
