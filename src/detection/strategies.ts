// Registry of chip detection strategies, in priority order.
// Each definition carries metadata & a tryDetect evaluator that reads one signal
// source through the host probes. A strategy that cannot find its signal
// declines (returns a verdict without a result); it does not throw.

import { ChipCatalog } from '../catalog';
import { KERNEL_LOG_EXCERPT_LINES, KERNEL_LOG_VENDOR_PATTERN } from '../constants';
import { HostProbes } from '../probes';
import { ChipMatch, Confidence, DetectionResult, DeviceSignature, StrategyId } from '../types';

export interface StrategyVerdict {
  signature: DeviceSignature;
  details: string[];
  result?: DetectionResult;
  declinedReason?: string;
}

export interface DetectionStrategy {
  id: StrategyId;
  label: string; // report section heading
  confidence: Confidence;
  tryDetect: (probes: HostProbes, catalog: ChipCatalog) => Promise<StrategyVerdict>;
}

const declined = (reason: string, signature: DeviceSignature = {}, details: string[] = []): StrategyVerdict =>
  ({ signature, details, declinedReason: reason });

export const deviceTreeStrategy: DetectionStrategy = {
  id: 'device-tree',
  label: 'Device-tree board model',
  confidence: 'exact',
  tryDetect: async (probes, catalog) => {
    const model = await probes.deviceTree.readModel();
    if (!model) return declined('no device-tree model available');
    const signature: DeviceSignature = { 'device-tree-model': model };
    const details = [`Model: ${model}`];
    const hit = catalog.matchBoardModel(model);
    if (!hit) return declined('unknown board model', signature, details);
    return {
      signature,
      details,
      result: { strategy: 'device-tree', confidence: 'exact', matches: [{ profile: hit.profile, evidence: hit.entry.match }] }
    };
  }
};

export const platformPropertiesStrategy: DetectionStrategy = {
  id: 'platform-properties',
  label: 'Android platform properties',
  confidence: 'exact',
  tryDetect: async (probes, catalog) => {
    const props = await probes.properties.readProperties();
    if (!props) return declined('platform property reader not available');
    const signature: DeviceSignature = {
      'platform-properties': `manufacturer=${props.manufacturer} model=${props.model} device=${props.device}`
    };
    const details = [`Manufacturer: ${props.manufacturer}`, `Model: ${props.model}`, `Device: ${props.device}`];
    const hit = catalog.matchDeviceCodename(props.device);
    if (!hit) {
      return declined('device not in known database', signature, [...details, 'Check /vendor/firmware/ for firmware files']);
    }
    return {
      signature,
      details: [...details, `Detected: ${hit.entry.deviceName}`],
      result: { strategy: 'platform-properties', confidence: 'exact', matches: [{ profile: hit.profile, evidence: hit.entry.device }] }
    };
  }
};

export const kernelLogStrategy: DetectionStrategy = {
  id: 'kernel-log',
  label: 'Broadcom references in kernel log',
  confidence: 'likely',
  tryDetect: async (probes, catalog) => {
    const log = await probes.kernelLog.readLog();
    if (!log) return declined('kernel log not readable');
    const vendorLines = log.split(/\r?\n/).filter(line => KERNEL_LOG_VENDOR_PATTERN.test(line));
    if (!vendorLines.length) return declined('no Broadcom lines in kernel log');
    const excerpt = vendorLines.slice(0, KERNEL_LOG_EXCERPT_LINES);
    const signature: DeviceSignature = { 'kernel-log': excerpt.join('\n') };
    // fragment order decides, not line order
    for (const entry of catalog.logFragments) {
      const line = vendorLines.find(l => l.includes(entry.fragment));
      if (!line) continue;
      const profile = catalog.getProfile(entry.chipId);
      if (!profile) continue;
      return {
        signature: { 'kernel-log': line },
        details: [`Matched: ${line.trim()}`],
        result: { strategy: 'kernel-log', confidence: 'likely', matches: [{ profile, evidence: line.trim() }] }
      };
    }
    return declined('could not determine exact chip model', signature, excerpt.map(l => l.trim()));
  }
};

export const firmwareFilesStrategy: DetectionStrategy = {
  id: 'firmware-files',
  label: 'Firmware files on this host',
  confidence: 'likely',
  tryDetect: async (probes, catalog) => {
    const listings = await probes.firmwareDirs.listFirmware();
    const listing = listings.find(l => l.files.length > 0);
    if (!listing) return declined('no firmware files in known directories');
    const signature: DeviceSignature = { 'firmware-filename': listing.files.join('\n') };
    const details = [`Location: ${listing.dir}`];
    const matches: ChipMatch[] = [];
    for (const file of listing.files) {
      const entry = catalog.matchFirmwareFilename(file);
      const profile = entry ? catalog.getProfile(entry.chipId) : undefined;
      details.push(profile ? `${file} -> ${profile.chipId} (${profile.displayName})` : file);
      if (profile && !matches.some(m => m.profile.chipId === profile.chipId)) {
        matches.push({ profile, evidence: file });
      }
    }
    if (!matches.length) return declined('firmware files do not match a known chip', signature, details);
    return { signature, details, result: { strategy: 'firmware-files', confidence: 'likely', matches } };
  }
};

export const DETECTION_STRATEGIES: readonly DetectionStrategy[] = Object.freeze([
  deviceTreeStrategy,
  platformPropertiesStrategy,
  kernelLogStrategy,
  firmwareFilesStrategy
]);
