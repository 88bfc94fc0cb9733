import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { SourceAcquirer, SourceAcquirerOptions } from './acquisition/source-acquirer';
import { ChipCatalog, getDefaultCatalog } from './catalog';
import { CHIP_ID_PATTERN, VERSION_ID_PATTERN } from './constants';
import { AcquisitionError, UsageError } from './errors';
import { StructureScaffolder, firmwareDir } from './scaffold';
import { AcquiredBinary, AcquisitionOutcome, ExtractionOptions, ExtractionResult } from './types';

export interface PipelineDeps extends SourceAcquirerOptions {
  catalog?: ChipCatalog;
}

export function validateExtractionTarget(chipId: string, versionId: string): void {
  if (!CHIP_ID_PATTERN.test(chipId)) throw new UsageError(`Invalid chip id: ${chipId} (expected e.g. bcm43455c0)`);
  if (!VERSION_ID_PATTERN.test(versionId)) throw new UsageError(`Invalid firmware version: ${versionId} (expected e.g. 7_45_206)`);
}

// Prefer a blob carrying the chip's numeric fragment (brcmfmac43455-sdio.bin for
// bcm43455c0); otherwise the first one in filename order.
export function selectBinary(binaries: AcquiredBinary[], fragment?: string): AcquiredBinary | undefined {
  const ordered = [...binaries].sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
  if (fragment) {
    const preferred = ordered.find(b => b.filename.includes(fragment));
    if (preferred) return preferred;
  }
  return ordered[0];
}

function notFound(options: ExtractionOptions, warnings: string[]): ExtractionResult {
  const result: ExtractionResult = {
    chipId: options.chipId,
    versionId: options.versionId,
    outputDir: firmwareDir(options.outputRoot, options.chipId, options.versionId),
    filesWritten: [],
    status: 'not-found',
    warnings: Object.freeze(warnings)
  };
  return Object.freeze(result);
}

// parse -> acquire -> scaffold. NO_FILES_FOUND becomes a not-found result with
// nothing written; other acquisition & scaffold errors propagate to the caller.
export async function runExtraction(options: ExtractionOptions, deps: PipelineDeps = {}): Promise<ExtractionResult> {
  validateExtractionTarget(options.chipId, options.versionId);
  const catalog = deps.catalog || getDefaultCatalog();
  const warnings: string[] = [];
  const profile = catalog.getProfile(options.chipId);
  if (!profile) warnings.push(`Chip ${options.chipId} is not in the catalog`);
  else if (!catalog.findCandidate(options.chipId, options.versionId)) {
    warnings.push(`Firmware version ${options.versionId} is not a known candidate for ${options.chipId}`);
  }

  const stagingDir = await fs.mkdtemp(path.join(os.tmpdir(), 'brcm-fw-stage-'));
  try {
    let outcome: AcquisitionOutcome;
    try {
      outcome = await new SourceAcquirer(deps).acquire(options.source, {
        chipId: options.chipId,
        versionId: options.versionId,
        stagingDir,
        verbose: options.verbose
      });
    } catch (e: unknown) {
      if (e instanceof AcquisitionError && e.code === 'NO_FILES_FOUND') return notFound(options, [...warnings, e.message]);
      throw e;
    }
    warnings.push(...outcome.warnings);

    const binary = selectBinary(outcome.binaries, catalog.firmwareFragmentFor(options.chipId));
    if (!binary) return notFound(options, warnings);
    if (outcome.binaries.length > 1) {
      warnings.push(`${outcome.binaries.length} firmware files found; using ${binary.filename}`);
    }

    const result = await new StructureScaffolder(options.verbose).scaffold(options.chipId, options.versionId, binary, options.outputRoot);
    const merged: ExtractionResult = { ...result, warnings: Object.freeze([...warnings, ...result.warnings]) };
    return Object.freeze(merged);
  } finally {
    await fs.remove(stagingDir);
  }
}
