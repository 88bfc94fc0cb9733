import * as fs from 'fs-extra';
import * as path from 'path';
import { isFirmwareFilename } from '../constants';
import { getErrorMessage } from '../errors';

export interface SkippedDirectory {
  dir: string;
  reason: string;
}

export interface FirmwareScan {
  files: string[];
  skipped: SkippedDirectory[]; // unreadable subdirectories (lost+found, ...)
}

// Recursively collect firmware blobs under root. Ordered by filename, then by
// full path, so "first match" is reproducible across runs and platforms.
// An unreadable subdirectory is skipped and reported; only a failure to read
// root itself rejects.
export async function findFirmwareFiles(root: string): Promise<FirmwareScan> {
  const found: string[] = [];
  const skipped: SkippedDirectory[] = [];
  const walk = async (current: string) => {
    let entries: fs.Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (e: unknown) {
      if (current === root) throw e;
      skipped.push({ dir: current, reason: getErrorMessage(e) });
      return;
    }
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) await walk(full);
      else if (!isFirmwareFilename(entry.name)) continue;
      else if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(full)))) found.push(full);
    }
  };
  await walk(root);
  return { files: found.sort(compareByFilename), skipped };
}

export function skippedWarnings(scan: FirmwareScan): string[] {
  return scan.skipped.map(s => `Skipped unreadable directory ${s.dir}: ${s.reason}`);
}

// /lib/firmware/brcm ships board-specific names as symlinks to the real blob;
// symlinked directories are not followed
async function isLinkToFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false; // dangling link
  }
}

export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export function compareByFilename(a: string, b: string): number {
  const na = path.basename(a);
  const nb = path.basename(b);
  if (na !== nb) return na < nb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}
