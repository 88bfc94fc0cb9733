// Pull vendor firmware off a connected Android device over adb (or any bridge
// with the same CLI: `version`, `devices`, `shell`, `pull`).

import * as fs from 'fs-extra';
import * as path from 'path';
import { PULL_TIMEOUT_MS, REMOTE_FIRMWARE_DIRS, getBridgeCommand, isFirmwareFilename } from '../constants';
import { AcquisitionError } from '../errors';
import { ExecFn, safeExec } from '../safe-exec';
import { AcquiredBinary, AcquireHints, AcquisitionOutcome, TransferFailure } from '../types';
import { compareByFilename } from './scan';

export interface BridgeAcquirerOptions {
  exec?: ExecFn;
  command?: string;
  remoteDirs?: string[];
}

// `adb devices` lists "<serial>\t<state>"; only "device" means connected & authorized
export function hasAuthorizedDevice(devicesOutput: string): boolean {
  return devicesOutput
    .split(/\r?\n/)
    .some(line => /^\S+\s+device$/.test(line.trim()));
}

export function parseRemoteListing(stdout: string): string[] {
  const files = stdout
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l.startsWith('/') && isFirmwareFilename(path.posix.basename(l)));
  return Array.from(new Set(files)).sort(compareByFilename);
}

export class BridgeAcquirer {
  private readonly exec: ExecFn;
  private readonly command: string;
  private readonly remoteDirs: string[];

  constructor(options: BridgeAcquirerOptions = {}) {
    this.exec = options.exec || safeExec;
    this.command = options.command || getBridgeCommand();
    this.remoteDirs = options.remoteDirs || REMOTE_FIRMWARE_DIRS;
  }

  async acquire(hints: AcquireHints): Promise<AcquisitionOutcome> {
    await this.ensureDevice();
    for (const dir of this.remoteDirs) {
      if (hints.verbose) console.log(`ℹ️  Checking ${dir}...`);
      const listing = await this.exec(this.command, ['shell', `ls ${dir}/fw_bcm*.bin ${dir}/brcmfmac*.bin 2>/dev/null`]);
      // ls exits non-zero when one glob is unmatched; trust stdout instead
      const remoteFiles = parseRemoteListing(listing.stdout);
      if (!remoteFiles.length) continue;
      if (hints.verbose) console.log(`✅ Found ${remoteFiles.length} firmware file(s) in ${dir}`);
      return this.pullAll(dir, remoteFiles, hints);
    }
    throw new AcquisitionError('NO_FILES_FOUND', `No firmware files found on device (checked ${this.remoteDirs.join(', ')})`);
  }

  private async ensureDevice(): Promise<void> {
    const version = await this.exec(this.command, ['version']);
    if (version.notFound) {
      throw new AcquisitionError('SOURCE_UNAVAILABLE', `${this.command} not found. Please install Android SDK platform-tools.`);
    }
    if (version.failed) {
      throw new AcquisitionError('SOURCE_UNAVAILABLE', `${this.command} is not usable: ${version.errorMessage || 'unknown error'}`);
    }
    const devices = await this.exec(this.command, ['devices']);
    if (devices.failed || !hasAuthorizedDevice(devices.stdout)) {
      throw new AcquisitionError('SOURCE_UNAVAILABLE', 'No Android device connected or unauthorized. Enable USB debugging and authorize this computer.');
    }
  }

  // Each pull is independent: a failed file is recorded and the rest still run
  private async pullAll(dir: string, remoteFiles: string[], hints: AcquireHints): Promise<AcquisitionOutcome> {
    await fs.ensureDir(hints.stagingDir);
    const binaries: AcquiredBinary[] = [];
    const failures: TransferFailure[] = [];
    for (const remote of remoteFiles) {
      const filename = path.posix.basename(remote);
      const local = path.join(hints.stagingDir, filename);
      if (hints.verbose) console.log(`ℹ️  Pulling ${filename}...`);
      const res = await this.exec(this.command, ['pull', remote, local], PULL_TIMEOUT_MS);
      if (res.failed || !(await fs.pathExists(local))) {
        failures.push({ originPath: remote, reason: res.errorMessage || 'file missing after pull' });
        continue;
      }
      binaries.push({ filename, originPath: remote, bytes: await fs.readFile(local) });
    }
    if (!binaries.length) {
      throw new AcquisitionError('PARTIAL_TRANSFER', `All ${failures.length} transfer(s) from ${dir} failed: ${failures.map(f => f.reason).join('; ')}`);
    }
    return {
      sourceLabel: `device:${dir}`,
      binaries,
      failures,
      warnings: failures.map(f => `Failed to pull ${f.originPath}: ${f.reason}`)
    };
  }
}
