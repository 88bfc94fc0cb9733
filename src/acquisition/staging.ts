import * as fs from 'fs-extra';
import * as path from 'path';
import { AcquiredBinary, AcquisitionOutcome } from '../types';
import { compareByFilename } from './scan';

// Copy local matches into the staging area, preserving filenames. Input is
// expected in findFirmwareFiles order; on a filename collision the first path wins.
export async function stageLocalFiles(files: string[], stagingDir: string, sourceLabel: string, verbose = false): Promise<AcquisitionOutcome> {
  await fs.ensureDir(stagingDir);
  const binaries: AcquiredBinary[] = [];
  const warnings: string[] = [];
  const taken = new Map<string, string>();
  for (const file of [...files].sort(compareByFilename)) {
    const filename = path.basename(file);
    const first = taken.get(filename);
    if (first) {
      warnings.push(`Skipped ${file}: same filename as ${first}`);
      continue;
    }
    taken.set(filename, file);
    const staged = path.join(stagingDir, filename);
    await fs.copy(file, staged, { dereference: true });
    if (verbose) console.log(`ℹ️  Staged ${filename}`);
    binaries.push({ filename, originPath: file, bytes: await fs.readFile(staged) });
  }
  return { sourceLabel, binaries, failures: [], warnings };
}
