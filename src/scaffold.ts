// Materializes <outputRoot>/<chip>/<version>/ for the external patch build:
// the firmware blob, a placeholder definitions.mk and a Makefile stub.
// Templates are only created when missing so hand-filled addresses survive a
// re-extraction; the blob itself is always rewritten (no backup).

import * as fs from 'fs-extra';
import * as path from 'path';
import { DEFINITIONS_FILE, MAKEFILE_FILE, SHARED_BUILD_RULES } from './constants';
import { ScaffoldError, getErrorMessage } from './errors';
import { AcquiredBinary, ExtractionResult, ExtractionStatus } from './types';

// Hook & pointer addresses the build needs; values come from manual firmware analysis
export const HOOK_ADDRESS_PLACEHOLDERS = [
  'WLC_UCODE_WRITE_BL_HOOK_ADDR',
  'HNDRTE_RECLAIM_0_END_PTR'
] as const;

export function renderDefinitionsTemplate(chipId: string, versionId: string): string {
  return [
    `# Firmware definitions for ${chipId} version ${versionId}`,
    '# TODO: Update these addresses based on firmware analysis',
    '',
    'NEXMON_CHIP=CHIP_VER_BCM',
    'NEXMON_CHIP_NUM=0x',
    'NEXMON_FW_VERSION=FW_VER_ALL',
    '',
    '# RAM addresses (update based on firmware analysis)',
    'RAMSTART=0x',
    'RAMSIZE=0x',
    '',
    '# Function addresses (update based on firmware analysis)',
    '# Use IDA Pro, Ghidra, or radare2 to find these',
    ...HOOK_ADDRESS_PLACEHOLDERS.map(name => `${name}=0x`),
    '',
    '# Template RAM',
    'TEMPLATERAMSTART_PTR=0x',
    '',
    '# Add more addresses as needed',
    ''
  ].join('\n');
}

export function renderMakefile(): string {
  return `include ${DEFINITIONS_FILE}\ninclude ${SHARED_BUILD_RULES}\n`;
}

export function firmwareDir(outputRoot: string, chipId: string, versionId: string): string {
  return path.join(outputRoot, chipId, versionId);
}

export class StructureScaffolder {
  constructor(private readonly verbose = false) {}

  async scaffold(chipId: string, versionId: string, binary: AcquiredBinary, outputRoot: string): Promise<ExtractionResult> {
    const dir = firmwareDir(outputRoot, chipId, versionId);
    const filesWritten: string[] = [];
    const warnings: string[] = [];
    let status: ExtractionStatus = 'success';

    try {
      await fs.ensureDir(dir);
      await fs.writeFile(path.join(dir, binary.filename), binary.bytes);
      filesWritten.push(binary.filename);
    } catch (e: unknown) {
      throw new ScaffoldError(`Unable to write ${binary.filename} to ${dir}: ${getErrorMessage(e)}`);
    }

    const templates: Array<[string, string]> = [
      [DEFINITIONS_FILE, renderDefinitionsTemplate(chipId, versionId)],
      [MAKEFILE_FILE, renderMakefile()]
    ];
    for (const [name, content] of templates) {
      try {
        if (await this.writeIfAbsent(path.join(dir, name), content)) filesWritten.push(name);
      } catch (e: unknown) {
        status = 'partial-failure';
        warnings.push(`Unable to create ${name}: ${getErrorMessage(e)}`);
      }
    }

    const result: ExtractionResult = {
      chipId,
      versionId,
      outputDir: dir,
      filesWritten: Object.freeze(filesWritten),
      status,
      warnings: Object.freeze(warnings)
    };
    return Object.freeze(result);
  }

  private async writeIfAbsent(file: string, content: string): Promise<boolean> {
    if (await fs.pathExists(file)) {
      if (this.verbose) console.log(`ℹ️  Keeping existing ${path.basename(file)}`);
      return false;
    }
    // wx: never clobber a file that appeared since the existence check
    await fs.writeFile(file, content, { flag: 'wx' });
    return true;
  }
}
