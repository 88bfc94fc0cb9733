import { getDefaultCatalog } from '../src/catalog';
import { DetectionEngine } from '../src/detection/engine';
import { DETECTION_STRATEGIES, DetectionStrategy } from '../src/detection/strategies';
import { fakeProbes } from './helpers';

const RPI4_DMESG = [
  '[    0.000000] Booting Linux on physical CPU 0x0',
  '[    5.102030] brcmfmac: F1 signature read @0x18000000=0x15264345',
  '[    5.110211] brcmfmac: brcmf_fw_alloc_request: using brcm/brcmfmac43455-sdio for chip BCM4345/6',
  '[    5.300100] usbcore: registered new interface driver brcmfmac'
].join('\n');

describe('detection engine', () => {
  const catalog = getDefaultCatalog();
  const engine = new DetectionEngine({ catalog });

  it('runs strategies in priority order', () => {
    expect(DETECTION_STRATEGIES.map(s => s.id)).toEqual(['device-tree', 'platform-properties', 'kernel-log', 'firmware-files']);
    expect(DETECTION_STRATEGIES.map(s => s.confidence)).toEqual(['exact', 'exact', 'likely', 'likely']);
  });

  it.each(catalog.boardModels.map(e => [e.match, e.chipId]))('maps board model "%s" to %s exactly', async (model, chipId) => {
    const outcome = await engine.detect(fakeProbes({ model }));
    expect(outcome.result?.strategy).toBe('device-tree');
    expect(outcome.result?.confidence).toBe('exact');
    expect(outcome.result?.matches.map(m => m.profile.chipId)).toEqual([chipId]);
    expect(outcome.attempts).toHaveLength(1);
  });

  it('does not consult lower-priority probes after a hit', async () => {
    const probes = fakeProbes({ model: 'Raspberry Pi 4 Model B Rev 1.4', properties: { manufacturer: 'LGE', model: 'Nexus 5', device: 'hammerhead' } });
    await engine.detect(probes);
    expect(probes.properties.readProperties).not.toHaveBeenCalled();
    expect(probes.kernelLog.readLog).not.toHaveBeenCalled();
  });

  it('falls through an unknown board model to platform properties', async () => {
    const probes = fakeProbes({ model: 'Generic ARM board', properties: { manufacturer: 'LGE', model: 'Nexus 5', device: 'hammerhead' } });
    const outcome = await engine.detect(probes);
    expect(outcome.attempts[0].declinedReason).toBe('unknown board model');
    expect(outcome.attempts[0].details).toEqual(['Model: Generic ARM board']);
    expect(outcome.result?.strategy).toBe('platform-properties');
    expect(outcome.result?.matches[0].profile.chipId).toBe('bcm4339');
    expect(outcome.attempts[1].details).toEqual(['Manufacturer: LGE', 'Model: Nexus 5', 'Device: hammerhead', 'Detected: Nexus 5']);
  });

  it('declines unknown codenames with a hint', async () => {
    const outcome = await engine.detect(fakeProbes({ properties: { manufacturer: 'Unknown', model: 'Unknown', device: 'sailfish' } }));
    const attempt = outcome.attempts[1];
    expect(attempt.declinedReason).toBe('device not in known database');
    expect(attempt.details[attempt.details.length - 1]).toBe('Check /vendor/firmware/ for firmware files');
  });

  it('reports a likely chip from the kernel log', async () => {
    const outcome = await engine.detect(fakeProbes({ log: RPI4_DMESG }));
    expect(outcome.result?.strategy).toBe('kernel-log');
    expect(outcome.result?.confidence).toBe('likely');
    expect(outcome.result?.matches[0].profile.chipId).toBe('bcm43455c0');
    expect(outcome.attempts[2].details).toEqual([
      'Matched: [    5.110211] brcmfmac: brcmf_fw_alloc_request: using brcm/brcmfmac43455-sdio for chip BCM4345/6'
    ]);
  });

  it('keeps a kernel log excerpt when no fragment matches', async () => {
    const log = Array.from({ length: 8 }, (_, i) => `[ ${i}.0] brcmfmac: line ${i}`).join('\n');
    const outcome = await engine.detect(fakeProbes({ log }));
    const attempt = outcome.attempts[2];
    expect(attempt.declinedReason).toBe('could not determine exact chip model');
    expect(attempt.details).toHaveLength(5);
    expect(attempt.details[0]).toBe('[ 0.0] brcmfmac: line 0');
  });

  it('declines a kernel log without Broadcom lines', async () => {
    const outcome = await engine.detect(fakeProbes({ log: '[ 0.0] Booting Linux\n[ 1.0] usb 1-1: new device' }));
    expect(outcome.attempts[2].declinedReason).toBe('no Broadcom lines in kernel log');
  });

  it('reports every distinct chip among host firmware files', async () => {
    const outcome = await engine.detect(fakeProbes({
      listings: [
        { dir: '/lib/firmware/brcm', files: [] },
        {
          dir: '/vendor/firmware',
          files: ['brcmfmac43430-sdio.bin', 'brcmfmac43455-sdio.bin', 'brcmfmac43455-sdio.raspberrypi,4-model-b.bin', 'brcmfmac4329-sdio.bin']
        }
      ]
    }));
    expect(outcome.result?.strategy).toBe('firmware-files');
    expect(outcome.result?.matches.map(m => m.profile.chipId)).toEqual(['bcm43430a1', 'bcm43455c0']);
    expect(outcome.attempts[3].details).toEqual([
      'Location: /vendor/firmware',
      'brcmfmac43430-sdio.bin -> bcm43430a1 (Raspberry Pi 3/Zero W)',
      'brcmfmac43455-sdio.bin -> bcm43455c0 (Raspberry Pi 3B+/4/5)',
      'brcmfmac43455-sdio.raspberrypi,4-model-b.bin -> bcm43455c0 (Raspberry Pi 3B+/4/5)',
      'brcmfmac4329-sdio.bin'
    ]);
  });

  it('returns no result when every strategy declines', async () => {
    const outcome = await engine.detect(fakeProbes());
    expect(outcome.result).toBeUndefined();
    expect(outcome.attempts.map(a => a.declinedReason)).toEqual([
      'no device-tree model available',
      'platform property reader not available',
      'kernel log not readable',
      'no firmware files in known directories'
    ]);
  });

  it('records a throwing probe as a decline and carries on', async () => {
    const probes = fakeProbes({ log: RPI4_DMESG });
    probes.deviceTree.readModel = jest.fn(async () => {
      throw new Error('EACCES: permission denied');
    });
    const outcome = await engine.detect(probes);
    expect(outcome.attempts[0].declinedReason).toBe('probe error: EACCES: permission denied');
    expect(outcome.result?.strategy).toBe('kernel-log');
  });

  it('accepts a custom strategy list', async () => {
    const never: DetectionStrategy = {
      id: 'firmware-files',
      label: 'Never',
      confidence: 'likely',
      tryDetect: async () => ({ signature: {}, details: [], declinedReason: 'disabled' })
    };
    const outcome = await new DetectionEngine({ catalog, strategies: [never] }).detect(fakeProbes({ model: 'Raspberry Pi 4' }));
    expect(outcome.attempts).toHaveLength(1);
    expect(outcome.result).toBeUndefined();
  });
});
