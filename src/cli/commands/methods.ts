/**
 * CLI: pii-screen methods
 */
import type { ScreenConfig } from '../../types/index.js';
import { buildDetectorRegistry } from '../../detectors/registry.js';

export async function methodsCommand(config: ScreenConfig): Promise<void> {
  const { detectors, unavailable } = buildDetectorRegistry(config.detectors);

  console.log('\n  Detection Methods\n');
  console.log('  ─────────────────────────────────────────\n');

  let i = 1;
  for (const [name, detector] of detectors) {
    console.log(`  ${i++}. \x1b[32m${name.padEnd(10)}\x1b[0m ${detector.description}`);
  }
  for (const u of unavailable) {
    console.log(`     \x1b[90m${u.name.padEnd(10)}\x1b[0m unavailable: ${u.reason}`);
  }

  console.log(`\n  ${detectors.size} available, ${unavailable.length} unavailable. Use 'all' to select every available method.\n`);
}
