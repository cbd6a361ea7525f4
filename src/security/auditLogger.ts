/**
 * Audit Logger
 * Structured JSONL audit log for screening runs. Finding values are never
 * logged, only counts.
 */
import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../core/config.js';
import type { AuditSeverity, AuditEntry } from '../types/index.js';

let auditLogPath: string = '~/.pii-screen/audit.jsonl';
let auditEnabled = true;

/**
 * Initialize the audit logger with a configured path.
 */
export function initAuditLog(path: string, enabled = true): void {
  auditLogPath = path;
  auditEnabled = enabled;
  if (!enabled) return;

  const resolved = resolvePath(auditLogPath);
  const dir = dirname(resolved);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

export function getAuditLogPath(): string {
  return resolvePath(auditLogPath);
}

/**
 * Write an audit entry.
 */
export function audit(
  severity: AuditSeverity,
  event: string,
  opts?: {
    method?: string;
    runId?: string;
    details?: Record<string, unknown>;
  },
): void {
  const entry: AuditEntry = {
    timestamp: new Date().toISOString(),
    severity,
    event,
    method: opts?.method,
    runId: opts?.runId,
    details: opts?.details,
  };

  const line = JSON.stringify(entry) + '\n';

  if (auditEnabled) {
    try {
      appendFileSync(resolvePath(auditLogPath), line, { mode: 0o600 });
    } catch {
      // Fallback to stderr if file write fails
      process.stderr.write(`[AUDIT-FALLBACK] ${line}`);
    }
  }

  if (severity === 'CRITICAL') {
    process.stderr.write(`\x1b[91m[CRITICAL AUDIT] ${event}\x1b[0m\n`);
  }
}

type AuditOptions = Parameters<typeof audit>[2];

export const auditInfo = (event: string, opts?: AuditOptions) =>
  audit('INFO', event, opts);

export const auditWarn = (event: string, opts?: AuditOptions) =>
  audit('WARN', event, opts);

export const auditError = (event: string, opts?: AuditOptions) =>
  audit('ERROR', event, opts);

export const auditCritical = (event: string, opts?: AuditOptions) =>
  audit('CRITICAL', event, opts);
