/**
 * Corpus Reader
 * Loads the text to screen. Any problem here aborts the run before a
 * detector is invoked.
 */
import { readFileSync, statSync } from 'node:fs';
import type { CorpusConfig } from '../types/index.js';
import { CorpusReadError, errorMessage } from './errors.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Reject text that is empty or looks binary. Control characters other
 * than NUL are left to the detectors.
 */
export function validateCorpusText(text: string): ValidationResult {
  const errors: string[] = [];

  if (text.trim().length === 0) {
    errors.push('corpus is empty');
  }

  if (text.includes('\0')) {
    errors.push('corpus contains null bytes (binary file?)');
  }

  return { valid: errors.length === 0, errors };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function readCorpus(path: string, opts: Pick<CorpusConfig, 'maxBytes'>): string {
  let size: number;
  try {
    const stat = statSync(path);
    if (!stat.isFile()) {
      throw new CorpusReadError(path, 'not a regular file');
    }
    size = stat.size;
  } catch (err) {
    if (err instanceof CorpusReadError) throw err;
    throw new CorpusReadError(path, isNotFound(err) ? 'file not found' : errorMessage(err), err);
  }

  if (size > opts.maxBytes) {
    throw new CorpusReadError(path, `file is ${size} bytes (max ${opts.maxBytes})`);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new CorpusReadError(path, errorMessage(err), err);
  }

  const validation = validateCorpusText(text);
  if (!validation.valid) {
    throw new CorpusReadError(path, validation.errors.join('; '));
  }

  return text;
}
