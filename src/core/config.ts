import { readFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { ScreenConfigSchema, type ScreenConfig } from '../types/index.js';
import { ConfigError } from './errors.js';

const SCREEN_DIR = join(homedir(), '.pii-screen');
const CONFIG_PATH = join(SCREEN_DIR, 'config.json');

/**
 * Config file location: explicit override, then PII_SCREEN_CONFIG, then the default.
 */
export function resolveConfigPath(overridePath?: string): string {
  return overridePath ?? (process.env['PII_SCREEN_CONFIG'] || CONFIG_PATH);
}

export function ensureScreenDir(): void {
  if (!existsSync(SCREEN_DIR)) {
    mkdirSync(SCREEN_DIR, { recursive: true, mode: 0o700 });
  }
}

/**
 * Resolve a value that may come from config or an env var.
 * Pattern: if `value` is set use it, otherwise read `envKey` from process.env.
 */
export function resolveSecret(value: string | undefined, envKey: string): string | undefined {
  if (value) return value;
  return process.env[envKey] || undefined;
}

/**
 * Load and validate the screening config.
 * Falls back to defaults if no config file exists.
 */
export function loadConfig(overridePath?: string): ScreenConfig {
  const configPath = resolveConfigPath(overridePath);
  let raw: unknown = {};

  if (existsSync(configPath)) {
    try {
      const content = readFileSync(configPath, 'utf-8');
      raw = JSON.parse(content);
    } catch (err) {
      throw new ConfigError(configPath, 'not valid JSON', err);
    }
  } else if (overridePath) {
    throw new ConfigError(configPath, 'file not found');
  }

  const parsed = ScreenConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(configPath, issues, parsed.error);
  }

  const config = parsed.data;

  // Resolve the analyzer endpoint from its env var
  const presidio = config.detectors.presidio;
  presidio.analyzerUrl = resolveSecret(presidio.analyzerUrl, presidio.analyzerUrlEnv);

  return config;
}

/**
 * Resolve tilde-prefixed paths to absolute.
 */
export function resolvePath(p: string): string {
  if (p.startsWith('~/')) {
    return join(homedir(), p.slice(2));
  }
  return p;
}
