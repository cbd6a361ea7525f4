/**
 * CLI: pii-screen doctor
 */
import type { ScreenConfig } from '../../types/index.js';
import { runDetectorDoctor, printDoctorResults } from '../detectorDoctor.js';

export async function doctorCommand(config: ScreenConfig, configPath: string): Promise<void> {
  const results = await runDetectorDoctor(config, { configPath });
  printDoctorResults(results);

  const failures = results.filter(r => r.status === 'FAIL');
  if (failures.length > 0) {
    process.exitCode = 1;
  }
}
