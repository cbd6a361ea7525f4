/**
 * CLI: pii-screen scan [file]
 * Read a corpus, pick detection methods, print per-method findings.
 */
import type { ScreenConfig } from '../../types/index.js';
import { resolvePath } from '../../core/config.js';
import { readCorpus } from '../../core/corpus.js';
import { DetectionCoordinator } from '../../core/coordinator.js';
import { CorpusReadError, errorMessage } from '../../core/errors.js';
import { buildDetectorRegistry } from '../../detectors/registry.js';
import { auditInfo } from '../../security/auditLogger.js';
import { flagValue, hasFlag, type ParsedArgs } from '../args.js';
import { parseMethodsFlag, promptForMethods } from '../selection.js';
import { printResults, resultsToJson } from '../report.js';

export async function scanCommand(config: ScreenConfig, args: ParsedArgs): Promise<void> {
  const corpusPath = resolvePath(args.positionals[1] ?? config.corpus.path);

  let corpus: string;
  try {
    corpus = readCorpus(corpusPath, config.corpus);
  } catch (err) {
    if (!(err instanceof CorpusReadError)) throw err;
    console.error(`Error: ${err.message}`);
    console.error('Exiting due to corpus read error.');
    process.exitCode = 1;
    return;
  }

  const { detectors, unavailable } = buildDetectorRegistry(config.detectors);
  for (const u of unavailable) {
    console.warn(`[Detectors] ${u.reason}`);
  }

  const coordinator = new DetectionCoordinator(detectors, {
    onDetectorError: (name, err) => {
      console.error(`[Scan] Error with ${name} detector: ${errorMessage(err)}`);
    },
  });

  if (coordinator.methods.length === 0) {
    console.error('No detectors available. Run `pii-screen doctor` for details.');
    process.exitCode = 1;
    return;
  }

  const selected = await selectMethods(coordinator, args, unavailable.map(u => u.name));
  if (selected.length === 0) {
    console.log('No methods selected. Exiting.');
    return;
  }

  auditInfo('scan_started', { details: { corpus: corpusPath, methods: selected, chars: corpus.length } });
  const results = await coordinator.run(corpus, selected);

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(resultsToJson(results), null, 2));
  } else {
    printResults(results);
  }
}

async function selectMethods(
  coordinator: DetectionCoordinator,
  args: ParsedArgs,
  unavailable: string[],
): Promise<string[]> {
  if (hasFlag(args, '--all')) return coordinator.methods;

  const methodsFlag = flagValue(args, '--methods');
  if (methodsFlag !== undefined) {
    const { methods, unknown } = parseMethodsFlag(methodsFlag, coordinator.methods);
    for (const name of unknown) {
      console.warn(unavailable.includes(name)
        ? `[Scan] Method '${name}' is unavailable, skipping`
        : `[Scan] Unknown method '${name}', skipping`);
    }
    return methods;
  }

  if (process.stdin.isTTY) {
    return promptForMethods(coordinator.methods);
  }

  // Non-interactive with no selection: run everything
  return coordinator.methods;
}
