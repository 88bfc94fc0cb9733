import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { HostProbes, PlatformProperties, FirmwareListing } from '../src/probes';
import { ExecFn, SafeExecResult } from '../src/safe-exec';

export function execResult(overrides: Partial<SafeExecResult> = {}): SafeExecResult {
  return {
    stdout: '',
    stderr: '',
    code: 0,
    signal: null,
    timedOut: false,
    failed: false,
    notFound: false,
    durationMs: 1,
    start: 0,
    ...overrides
  };
}

export function execFailure(errorMessage: string, overrides: Partial<SafeExecResult> = {}): SafeExecResult {
  return execResult({ failed: true, code: 1, errorMessage, ...overrides });
}

export interface FakeProbeValues {
  model?: string;
  properties?: PlatformProperties;
  log?: string;
  listings?: FirmwareListing[];
}

export function fakeProbes(values: FakeProbeValues = {}): HostProbes {
  return {
    deviceTree: { readModel: jest.fn(async () => values.model) },
    properties: { readProperties: jest.fn(async () => values.properties) },
    kernelLog: { readLog: jest.fn(async () => values.log) },
    firmwareDirs: { listFirmware: jest.fn(async () => values.listings || []) }
  };
}

export interface FakeBridgeOptions {
  missing?: boolean;
  devices?: string;
  listings?: Record<string, string>; // remote dir -> ls stdout
  failPulls?: string[]; // basenames whose pull fails
}

// Stand-in for the adb executable: answers version/devices/shell ls/pull
export function fakeBridge(options: FakeBridgeOptions = {}): { exec: ExecFn; calls: string[][] } {
  const calls: string[][] = [];
  const exec: ExecFn = async (cmd, args = []) => {
    calls.push([cmd, ...args]);
    const [sub, arg1, arg2] = args;
    if (options.missing) return execFailure('spawn adb ENOENT', { notFound: true, code: null });
    if (sub === 'version') return execResult({ stdout: 'Android Debug Bridge version 1.0.41' });
    if (sub === 'devices') return execResult({ stdout: options.devices ?? 'List of devices attached\n0123456789ABCDEF\tdevice\n' });
    if (sub === 'shell') {
      const dir = Object.keys(options.listings || {}).find(d => (arg1 || '').startsWith(`ls ${d}/`));
      return dir && options.listings ? execResult({ stdout: options.listings[dir] }) : execFailure('', { stdout: '' });
    }
    if (sub === 'pull' && arg1 && arg2) {
      const name = path.posix.basename(arg1);
      if ((options.failPulls || []).includes(name)) return execFailure(`adb: error: failed to copy '${arg1}'`);
      await fs.writeFile(arg2, `blob:${name}`);
      return execResult({ stdout: `${arg1}: 1 file pulled` });
    }
    return execFailure('unexpected call');
  };
  return { exec, calls };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `brcm-fw-test-${prefix}-`));
}
