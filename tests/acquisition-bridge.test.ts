import * as fs from 'fs-extra';
import * as path from 'path';
import { BridgeAcquirer, hasAuthorizedDevice, parseRemoteListing } from '../src/acquisition/bridge-acquirer';
import { AcquisitionError } from '../src/errors';
import { fakeBridge, makeTempDir } from './helpers';

async function rejection(promise: Promise<unknown>): Promise<AcquisitionError> {
  const err = await promise.then(() => undefined, (e: unknown) => e);
  if (!(err instanceof AcquisitionError)) throw new Error(`expected AcquisitionError, got ${String(err)}`);
  return err;
}

describe('bridge helpers', () => {
  it('recognises only authorized devices', () => {
    expect(hasAuthorizedDevice('List of devices attached\n0123456789ABCDEF\tdevice\n')).toBe(true);
    expect(hasAuthorizedDevice('List of devices attached\n0123456789ABCDEF\tunauthorized\n')).toBe(false);
    expect(hasAuthorizedDevice('List of devices attached\n\n')).toBe(false);
  });

  it('keeps absolute firmware paths from a listing', () => {
    const stdout = [
      '/vendor/firmware/fw_bcm4358.bin',
      'ls: /vendor/firmware/brcmfmac*.bin: No such file or directory',
      '/vendor/firmware/fw_bcm4358_apsta.bin',
      '/vendor/firmware/fw_bcm4358.bin',
      ''
    ].join('\r\n');
    expect(parseRemoteListing(stdout)).toEqual(['/vendor/firmware/fw_bcm4358.bin', '/vendor/firmware/fw_bcm4358_apsta.bin']);
  });
});

describe('bridge acquisition', () => {
  let staging: string;

  beforeEach(async () => {
    staging = path.join(await makeTempDir('bridge'), 'staging');
  });

  afterEach(async () => {
    await fs.remove(path.dirname(staging));
  });

  it('pulls every firmware file from the first directory that has any', async () => {
    const bridge = fakeBridge({
      listings: {
        '/system/vendor/firmware': '/system/vendor/firmware/fw_bcm4339_apsta.bin\n/system/vendor/firmware/fw_bcm4339.bin\n',
        '/system/etc/firmware': '/system/etc/firmware/fw_bcm4339.bin\n'
      }
    });
    const outcome = await new BridgeAcquirer({ exec: bridge.exec, command: 'adb' }).acquire({ stagingDir: staging });
    expect(outcome.sourceLabel).toBe('device:/system/vendor/firmware');
    expect(outcome.binaries.map(b => b.filename)).toEqual(['fw_bcm4339.bin', 'fw_bcm4339_apsta.bin']);
    expect(outcome.binaries[0].bytes.toString()).toBe('blob:fw_bcm4339.bin');
    expect(outcome.failures).toEqual([]);
    const shellCalls = bridge.calls.filter(c => c[1] === 'shell');
    expect(shellCalls).toHaveLength(2);
    expect(shellCalls[0][2]).toBe('ls /vendor/firmware/fw_bcm*.bin /vendor/firmware/brcmfmac*.bin 2>/dev/null');
  });

  it('keeps going when some pulls fail', async () => {
    const bridge = fakeBridge({
      listings: { '/vendor/firmware': '/vendor/firmware/fw_bcm4356.bin\n/vendor/firmware/fw_bcm4356_apsta.bin\n' },
      failPulls: ['fw_bcm4356_apsta.bin']
    });
    const outcome = await new BridgeAcquirer({ exec: bridge.exec }).acquire({ stagingDir: staging });
    expect(outcome.binaries.map(b => b.filename)).toEqual(['fw_bcm4356.bin']);
    expect(outcome.failures).toEqual([
      { originPath: '/vendor/firmware/fw_bcm4356_apsta.bin', reason: "adb: error: failed to copy '/vendor/firmware/fw_bcm4356_apsta.bin'" }
    ]);
    expect(outcome.warnings).toEqual([
      "Failed to pull /vendor/firmware/fw_bcm4356_apsta.bin: adb: error: failed to copy '/vendor/firmware/fw_bcm4356_apsta.bin'"
    ]);
  });

  it('fails with PARTIAL_TRANSFER when nothing could be pulled', async () => {
    const bridge = fakeBridge({
      listings: { '/vendor/firmware': '/vendor/firmware/fw_bcm4356.bin\n' },
      failPulls: ['fw_bcm4356.bin']
    });
    const err = await rejection(new BridgeAcquirer({ exec: bridge.exec }).acquire({ stagingDir: staging }));
    expect(err.code).toBe('PARTIAL_TRANSFER');
  });

  it('reports a missing bridge tool', async () => {
    const bridge = fakeBridge({ missing: true });
    const err = await rejection(new BridgeAcquirer({ exec: bridge.exec, command: 'adb' }).acquire({ stagingDir: staging }));
    expect(err.code).toBe('SOURCE_UNAVAILABLE');
    expect(err.message).toBe('adb not found. Please install Android SDK platform-tools.');
  });

  it('reports an unauthorized device', async () => {
    const bridge = fakeBridge({ devices: 'List of devices attached\n0123456789ABCDEF\tunauthorized\n' });
    const err = await rejection(new BridgeAcquirer({ exec: bridge.exec }).acquire({ stagingDir: staging }));
    expect(err.code).toBe('SOURCE_UNAVAILABLE');
    expect(err.message).toBe('No Android device connected or unauthorized. Enable USB debugging and authorize this computer.');
    expect(bridge.calls.some(c => c[1] === 'shell')).toBe(false);
  });

  it('fails with NO_FILES_FOUND after checking every directory', async () => {
    const bridge = fakeBridge({ listings: {} });
    const err = await rejection(new BridgeAcquirer({ exec: bridge.exec }).acquire({ stagingDir: staging }));
    expect(err.code).toBe('NO_FILES_FOUND');
    expect(err.message).toBe('No firmware files found on device (checked /vendor/firmware, /system/vendor/firmware, /system/etc/firmware)');
  });
});
