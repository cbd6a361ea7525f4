/**
 * CLI: pii-screen audit
 * View the audit log.
 */
import { readFileSync, existsSync } from 'node:fs';
import type { ScreenConfig, AuditEntry } from '../../types/index.js';
import { resolvePath } from '../../core/config.js';
import { flagValue, type ParsedArgs } from '../args.js';

const DEFAULT_TAIL = 50;

export function parseAuditLine(line: string): AuditEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof raw !== 'object' || raw === null) return null;
  if (!('timestamp' in raw) || !('severity' in raw) || !('event' in raw)) return null;

  const { timestamp, severity, event } = raw;
  if (typeof timestamp !== 'string' || typeof event !== 'string') return null;
  if (severity !== 'INFO' && severity !== 'WARN' && severity !== 'ERROR' && severity !== 'CRITICAL') return null;

  const method = 'method' in raw && typeof raw.method === 'string' ? raw.method : undefined;
  return { timestamp, severity, event, method };
}

export async function auditViewCommand(config: ScreenConfig, args: ParsedArgs): Promise<void> {
  const logPath = resolvePath(config.audit.logPath);

  if (!existsSync(logPath)) {
    console.log('No audit log found yet.');
    return;
  }

  const lines = readFileSync(logPath, 'utf-8').trim().split('\n').filter(Boolean);

  const tail = Number.parseInt(flagValue(args, '--tail') ?? String(DEFAULT_TAIL), 10);
  const count = Number.isNaN(tail) || tail <= 0 ? DEFAULT_TAIL : tail;
  const entries = lines.slice(-count);

  console.log(`\n  Audit Log (last ${entries.length} entries)\n`);
  console.log('  ─────────────────────────────────────────\n');

  let malformed = 0;
  for (const line of entries) {
    const entry = parseAuditLine(line);
    if (!entry) {
      malformed++;
      continue;
    }
    const severityColor = entry.severity === 'CRITICAL' ? '\x1b[91m'
      : entry.severity === 'ERROR' ? '\x1b[31m'
      : entry.severity === 'WARN' ? '\x1b[33m'
      : '\x1b[90m';
    const time = entry.timestamp.slice(11, 19);
    const method = entry.method ? ` [${entry.method}]` : '';
    console.log(`  ${time} ${severityColor}${entry.severity.padEnd(8)}\x1b[0m ${entry.event}${method}`);
  }

  console.log(`\n  Total entries: ${lines.length}`);
  if (malformed > 0) console.log(`  Malformed lines skipped: ${malformed}`);
  console.log(`  Log path: ${logPath}\n`);
}
