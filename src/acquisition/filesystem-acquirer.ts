import * as path from 'path';
import { AcquisitionError, getErrorMessage } from '../errors';
import { AcquireHints, AcquisitionOutcome } from '../types';
import { FirmwareScan, findFirmwareFiles, isDirectory, skippedWarnings } from './scan';
import { stageLocalFiles } from './staging';

export async function assertDirectory(dir: string, what: string): Promise<void> {
  if (!(await isDirectory(dir))) throw new AcquisitionError('SOURCE_UNAVAILABLE', `${what} not found: ${dir}`);
}

// A source root that exists but cannot be listed is as unavailable as a missing one
export async function scanSource(root: string): Promise<FirmwareScan> {
  try {
    return await findFirmwareFiles(root);
  } catch (e: unknown) {
    throw new AcquisitionError('SOURCE_UNAVAILABLE', `Unable to read ${root}: ${getErrorMessage(e)}`);
  }
}

export async function stageScan(scan: FirmwareScan, stagingDir: string, sourceLabel: string, verbose?: boolean): Promise<AcquisitionOutcome> {
  const outcome = await stageLocalFiles(scan.files, stagingDir, sourceLabel, verbose);
  return { ...outcome, warnings: [...skippedWarnings(scan), ...outcome.warnings] };
}

export class FilesystemAcquirer {
  constructor(private readonly root: string) {}

  async acquire(hints: AcquireHints): Promise<AcquisitionOutcome> {
    const root = path.resolve(this.root);
    await assertDirectory(root, 'Source directory');
    if (hints.verbose) console.log(`ℹ️  Extracting firmware from filesystem: ${root}`);
    const scan = await scanSource(root);
    if (!scan.files.length) throw new AcquisitionError('NO_FILES_FOUND', `No firmware files found in ${root}`);
    return stageScan(scan, hints.stagingDir, root, hints.verbose);
  }
}
