import * as path from 'path';
import { IMAGE_FIRMWARE_SUBDIRS } from '../constants';
import { AcquisitionError, getErrorMessage } from '../errors';
import { AcquireHints, AcquisitionOutcome } from '../types';
import { assertDirectory, scanSource, stageScan } from './filesystem-acquirer';
import { findFirmwareFiles, isDirectory } from './scan';

// Works on an image that has already been mounted or unpacked (simg2img + mount,
// 7z x, ...). The well-known firmware locations inside the image are searched
// first so stray copies elsewhere in the tree do not shadow the real blobs.
export class ImageAcquirer {
  constructor(private readonly root: string, private readonly subdirs: string[] = IMAGE_FIRMWARE_SUBDIRS) {}

  async acquire(hints: AcquireHints): Promise<AcquisitionOutcome> {
    const root = path.resolve(this.root);
    await assertDirectory(root, 'Image root');
    if (hints.verbose) console.log(`ℹ️  Extracting firmware from image: ${root}`);
    for (const sub of this.subdirs) {
      const dir = path.join(root, sub);
      if (!(await isDirectory(dir))) continue;
      try {
        const scan = await findFirmwareFiles(dir);
        if (scan.files.length) return stageScan(scan, hints.stagingDir, dir, hints.verbose);
      } catch (e: unknown) {
        // unreadable well-known location: the full-tree scan below reports it
        if (hints.verbose) console.warn(`⚠️  Cannot read ${dir}: ${getErrorMessage(e)}`);
      }
    }
    const scan = await scanSource(root);
    if (!scan.files.length) throw new AcquisitionError('NO_FILES_FOUND', `No firmware files found in image ${root}`);
    return stageScan(scan, hints.stagingDir, root, hints.verbose);
  }
}
