/**
 * Method selection: the numbered checklist prompt and the --methods flag.
 */
import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import { ALL_METHODS } from '../core/coordinator.js';

export type SelectionResult =
  | { ok: true; methods: string[] }
  | { ok: false; error: string };

export const INVALID_NUMBER = 'Invalid selection. Please enter valid numbers.';
export const INVALID_INPUT = "Invalid input. Please enter numbers separated by spaces or 'all'.";

/**
 * Parse one line of prompt input: `all`, 1-based numbers, or method names,
 * separated by spaces or commas. Empty input selects nothing.
 */
export function parseSelection(input: string, available: readonly string[]): SelectionResult {
  const trimmed = input.trim().toLowerCase();
  if (trimmed === ALL_METHODS) return { ok: true, methods: [...available] };

  const methods: string[] = [];
  for (const token of trimmed.split(/[\s,]+/).filter(Boolean)) {
    let name: string | undefined;
    if (/^\d+$/.test(token)) {
      name = available[Number(token) - 1];
      if (name === undefined) return { ok: false, error: INVALID_NUMBER };
    } else if (available.includes(token)) {
      name = token;
    } else {
      return { ok: false, error: INVALID_INPUT };
    }
    if (!methods.includes(name)) methods.push(name);
  }

  return { ok: true, methods };
}

/**
 * Split a --methods value. Names that are not registered are returned
 * separately so the caller can report them and carry on.
 */
export function parseMethodsFlag(
  value: string,
  available: readonly string[],
): { methods: string[]; unknown: string[] } {
  const methods: string[] = [];
  const unknown: string[] = [];

  for (const raw of value.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (name === ALL_METHODS) {
      for (const m of available) if (!methods.includes(m)) methods.push(m);
    } else if (available.includes(name)) {
      if (!methods.includes(name)) methods.push(name);
    } else if (!unknown.includes(name)) {
      unknown.push(name);
    }
  }

  return { methods, unknown };
}

export function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export function formatMenu(available: readonly string[]): string {
  const lines = ['', 'Select PII Detection Methods (like checkboxes):'];
  available.forEach((method, i) => lines.push(`${i + 1}. ${capitalize(method)}`));
  lines.push("Enter the numbers of the methods to use (e.g., '1 2' or '1 3'), or 'all':");
  return lines.join('\n');
}

/**
 * Ask until the answer parses. Invalid answers are reported and asked
 * again; closing the input selects nothing.
 */
export async function promptForMethods(
  available: readonly string[],
  io: { input: Readable; output: Writable } = { input: process.stdin, output: process.stdout },
): Promise<string[]> {
  const rl = createInterface({ input: io.input, output: io.output });
  const closed = new AbortController();
  rl.once('close', () => closed.abort());

  io.output.write(formatMenu(available) + '\n');

  try {
    while (true) {
      let answer: string;
      try {
        answer = await rl.question('> ', { signal: closed.signal });
      } catch (err) {
        if (closed.signal.aborted) return [];
        throw err;
      }

      const result = parseSelection(answer, available);
      if (result.ok) return result.methods;
      io.output.write(result.error + '\n');
    }
  } finally {
    if (!closed.signal.aborted) rl.close();
  }
}
