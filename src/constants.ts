// Centralized constants for firmware locations, filename conventions & env-driven settings.

import * as path from 'path';

// Firmware filename conventions: vendor blobs on Android (fw_bcm*.bin) and the
// mainline brcmfmac driver naming (brcmfmac*.bin).
export const FIRMWARE_FILE_PATTERNS: RegExp[] = [/^fw_bcm.*\.bin$/, /^brcmfmac.*\.bin$/];

export function isFirmwareFilename(name: string): boolean {
  return FIRMWARE_FILE_PATTERNS.some(re => re.test(name));
}

// Local directories enumerated by the firmware-files detection strategy (probe order)
export const HOST_FIRMWARE_DIRS = ['/lib/firmware/brcm', '/vendor/firmware', '/system/vendor/firmware'];

// Remote directories probed over the bridge (probe order)
export const REMOTE_FIRMWARE_DIRS = ['/vendor/firmware', '/system/vendor/firmware', '/system/etc/firmware'];

// Firmware locations inside a mounted system / vendor image, relative to its root
export const IMAGE_FIRMWARE_SUBDIRS = ['vendor/firmware', 'system/vendor/firmware', 'system/etc/firmware', 'lib/firmware/brcm'];

// Device-tree model files, first readable wins
export const DEVICE_TREE_MODEL_FILES = ['/proc/device-tree/model', '/sys/firmware/devicetree/base/model'];

export const KERNEL_LOG_VENDOR_PATTERN = /brcm|broadcom/i;
export const KERNEL_LOG_EXCERPT_LINES = 5;

// chip ids follow bcm<model><revision>, e.g. bcm43455c0, bcm4339
export const CHIP_ID_PATTERN = /^bcm[0-9]{4,5}[a-z0-9]*$/;
export const VERSION_ID_PATTERN = /^[0-9a-z_]+$/;

export const DEFINITIONS_FILE = 'definitions.mk';
export const MAKEFILE_FILE = 'Makefile';
export const SHARED_BUILD_RULES = '$(NEXMON_ROOT)/firmwares/common.mk';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  const parsed = raw ? parseInt(raw, 10) : NaN;
  if (!isNaN(parsed) && parsed > 0) return parsed;
  return fallback;
}

export const DEFAULT_TOOL_TIMEOUT_MS = intFromEnv('BRCMFW_TOOL_TIMEOUT_MS', 5000);
// adb pull of a multi-megabyte blob over USB 2 can take a while
export const PULL_TIMEOUT_MS = intFromEnv('BRCMFW_PULL_TIMEOUT_MS', 60000);

export function getBridgeCommand(): string {
  return (process.env.BRCMFW_BRIDGE || '').trim() || 'adb';
}

// Root the default output directory hangs off (<root>/firmwares/<chip>/<version>)
export function getProjectRoot(): string {
  return path.resolve(process.env.BRCMFW_ROOT || process.cwd());
}

export function defaultOutputRoot(): string {
  return path.join(getProjectRoot(), 'firmwares');
}

export function defaultPatchPath(chipId: string, versionId: string): string {
  return `patches/${chipId}/${versionId}/nexmon/`;
}
