#!/usr/bin/env node
/**
 * pii-screen CLI
 * Main entry point for all commands.
 */
import { loadConfig, ensureScreenDir, resolveConfigPath } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { initAuditLog } from '../security/auditLogger.js';
import { parseArgs, flagValue, hasFlag } from './args.js';
import { scanCommand } from './commands/scan.js';
import { methodsCommand } from './commands/methods.js';
import { doctorCommand } from './commands/doctor.js';
import { auditViewCommand } from './commands/auditView.js';

const VERSION = '1.0.0';

const USAGE = `
pii-screen - Screen text corpora for personally identifiable information

Usage:
  pii-screen scan [file]            Scan a corpus (default: corpus.path from config)
  pii-screen methods                List detection methods and their availability
  pii-screen doctor                 Check detector backends and configuration
  pii-screen audit                  View the audit log

Scan options:
  --methods <a,b>   Methods to run (regex, ner, presidio, or all)
  --all             Run every available method
  --json            Print results as JSON

Options:
  --config <path>   Config file (default: ~/.pii-screen/config.json)
  --tail <n>        Audit entries to show (default: 50)
  --help, -h        Show this help
  --version         Show version
`.trim();

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (hasFlag(args, '--help', '-h') || args.positionals.length === 0) {
    console.log(USAGE);
    return;
  }

  if (hasFlag(args, '--version')) {
    console.log(`pii-screen v${VERSION}`);
    return;
  }

  ensureScreenDir();

  const configPath = flagValue(args, '--config');
  const config = loadConfig(configPath);
  initAuditLog(config.audit.logPath, config.audit.enabled);

  const command = args.positionals[0];

  switch (command) {
    case 'scan':
      await scanCommand(config, args);
      break;

    case 'methods':
      await methodsCommand(config);
      break;

    case 'doctor':
      await doctorCommand(config, resolveConfigPath(configPath));
      break;

    case 'audit':
      await auditViewCommand(config, args);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
