// Read-only host capability probes consumed by the detection strategies.
// A probe that cannot answer (missing file, missing tool, permission denied)
// resolves to undefined; it never rejects.

import * as fs from 'fs-extra';
import * as path from 'path';
import { DEVICE_TREE_MODEL_FILES, HOST_FIRMWARE_DIRS } from './constants';
import { findFirmwareFiles } from './acquisition/scan';
import { ExecFn, safeExec } from './safe-exec';

export interface PlatformProperties {
  manufacturer: string;
  model: string;
  device: string;
}

export interface FirmwareListing {
  dir: string;
  files: string[]; // basenames, sorted
}

export interface DeviceTreeProbe {
  readModel(): Promise<string | undefined>;
}

export interface PropertyProbe {
  readProperties(): Promise<PlatformProperties | undefined>;
}

export interface KernelLogProbe {
  readLog(): Promise<string | undefined>;
}

export interface FirmwareDirectoryProbe {
  // Listings for every known directory that exists, in probe order
  listFirmware(): Promise<FirmwareListing[]>;
}

export interface HostProbes {
  deviceTree: DeviceTreeProbe;
  properties: PropertyProbe;
  kernelLog: KernelLogProbe;
  firmwareDirs: FirmwareDirectoryProbe;
}

export function cleanDeviceTreeString(raw: string): string {
  return raw.replace(/\0/g, '').trim();
}

export class FileDeviceTreeProbe implements DeviceTreeProbe {
  constructor(private readonly files: string[] = DEVICE_TREE_MODEL_FILES) {}

  async readModel(): Promise<string | undefined> {
    for (const file of this.files) {
      try {
        const model = cleanDeviceTreeString(await fs.readFile(file, 'utf8'));
        if (model) return model;
      } catch {
        // not present on this host; try the next location
      }
    }
    return undefined;
  }
}

export class GetpropPropertyProbe implements PropertyProbe {
  constructor(private readonly exec: ExecFn = safeExec, private readonly command = 'getprop') {}

  async readProperties(): Promise<PlatformProperties | undefined> {
    const read = async (key: string): Promise<string | undefined> => {
      const res = await this.exec(this.command, [key]);
      if (res.failed) return undefined;
      return res.stdout.trim() || undefined;
    };
    const device = await read('ro.product.device');
    if (device === undefined) return undefined;
    const manufacturer = (await read('ro.product.manufacturer')) || 'Unknown';
    const model = (await read('ro.product.model')) || 'Unknown';
    return { manufacturer, model, device };
  }
}

export class DmesgKernelLogProbe implements KernelLogProbe {
  constructor(private readonly exec: ExecFn = safeExec) {}

  async readLog(): Promise<string | undefined> {
    const res = await this.exec('dmesg', []);
    // dmesg_restrict makes unprivileged reads fail; that is a decline, not an error
    if (res.failed || !res.stdout) return undefined;
    return res.stdout;
  }
}

export class LocalFirmwareDirectoryProbe implements FirmwareDirectoryProbe {
  constructor(private readonly dirs: string[] = HOST_FIRMWARE_DIRS) {}

  async listFirmware(): Promise<FirmwareListing[]> {
    const listings: FirmwareListing[] = [];
    for (const dir of this.dirs) {
      try {
        if (!(await fs.pathExists(dir))) continue;
        // unreadable subdirectories are skipped by the scan; the rest still counts
        const { files: found } = await findFirmwareFiles(dir);
        const files = Array.from(new Set(found.map(f => path.basename(f))));
        listings.push({ dir, files });
      } catch {
        // unreadable directory counts as absent
      }
    }
    return listings;
  }
}

export function createHostProbes(exec: ExecFn = safeExec): HostProbes {
  return {
    deviceTree: new FileDeviceTreeProbe(),
    properties: new GetpropPropertyProbe(exec),
    kernelLog: new DmesgKernelLogProbe(exec),
    firmwareDirs: new LocalFirmwareDirectoryProbe()
  };
}
