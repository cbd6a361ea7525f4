/**
 * Minimal argv splitter: positionals, boolean flags and flags that take a value.
 */

const VALUE_FLAGS = new Set(['--config', '--methods', '--tail']);

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }

    // --flag=value
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1) {
      flags.set(arg.slice(0, eq), arg.slice(eq + 1));
      continue;
    }

    const next = argv[i + 1];
    if (VALUE_FLAGS.has(arg) && next !== undefined && !next.startsWith('-')) {
      flags.set(arg, next);
      i++;
    } else {
      flags.set(arg, true);
    }
  }

  return { positionals, flags };
}

export function flagValue(args: ParsedArgs, flag: string): string | undefined {
  const value = args.flags.get(flag);
  return typeof value === 'string' ? value : undefined;
}

export function hasFlag(args: ParsedArgs, ...names: string[]): boolean {
  return names.some(n => args.flags.has(n));
}
