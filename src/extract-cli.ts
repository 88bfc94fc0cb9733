#!/usr/bin/env node
// Firmware extraction CLI: acquire blobs from a device, directory or mounted
// image and scaffold <output>/<chip>/<version>/ for the patch build.

import * as path from 'path';
import { isDirectory } from './acquisition/scan';
import { describeSource } from './acquisition/source-acquirer';
import { CliOptions, flagArg, parseCliArgs, stringArg } from './cli-args';
import { DEFINITIONS_FILE, defaultOutputRoot } from './constants';
import { AcquisitionError, CatalogError, ScaffoldError, UsageError, getErrorMessage } from './errors';
import { banner, missingList, printStatus } from './format';
import { PipelineDeps, runExtraction } from './pipeline';
import { ExtractionResult, FirmwareSource } from './types';

export const EXTRACT_USAGE = `Usage: brcm-fw-extract [OPTIONS]

Automated firmware extraction from various sources.

OPTIONS:
    -s, --source SOURCE     "adb" for a connected device, or a directory path
    -c, --chip CHIP         Chip model (e.g., bcm43455c0)
    -v, --version VERSION   Firmware version (e.g., 7_45_206)
    -o, --output DIR        Output root (default: <root>/firmwares)
        --image             Treat --source as a mounted firmware image root
        --verbose           Print every step
    -h, --help              Show this help message

EXAMPLES:
    # Extract from connected Android device
    brcm-fw-extract --source adb --chip bcm4339 --version 6_37_34_43

    # Extract from Raspberry Pi
    brcm-fw-extract --source /lib/firmware/brcm --chip bcm43455c0 --version 7_45_206

    # Extract from a mounted system image
    brcm-fw-extract --source /mnt/system --image --chip bcm4358 --version 7_112_300_14_sta
`;

const OPTIONS: CliOptions = {
  source: { type: 'string', short: 's' },
  chip: { type: 'string', short: 'c' },
  version: { type: 'string', short: 'v' },
  output: { type: 'string', short: 'o' },
  image: { type: 'boolean' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' }
};

function usageFailure(message: string): number {
  printStatus('error', message);
  console.log(EXTRACT_USAGE);
  return 1;
}

// "adb" selects the bridge; anything else must be an existing directory
export async function resolveSource(source: string, image: boolean): Promise<FirmwareSource> {
  if (source === 'adb') {
    if (image) throw new UsageError('--image cannot be combined with --source adb');
    return { kind: 'bridge' };
  }
  const resolved = path.resolve(source);
  if (!(await isDirectory(resolved))) throw new UsageError(`Invalid source: ${source}`);
  return image ? { kind: 'image', root: resolved } : { kind: 'filesystem', path: resolved };
}

function printResult(result: ExtractionResult): void {
  for (const warning of result.warnings) printStatus('warning', warning);
  printStatus('success', `Wrote ${result.filesWritten.length} file(s) to ${result.outputDir}:`);
  result.filesWritten.forEach(f => console.log(`  • ${f}`));
  if (result.filesWritten.includes(DEFINITIONS_FILE)) {
    printStatus('warning', `You need to update addresses in ${path.join(result.outputDir, DEFINITIONS_FILE)}`);
  }
  console.log('');
  printStatus('info', 'Next steps:');
  console.log('  1. Analyze firmware with IDA Pro/Ghidra/radare2');
  console.log(`  2. Update addresses in ${path.join(result.outputDir, DEFINITIONS_FILE)}`);
  console.log(`  3. Extract flashpatches: cd ${result.outputDir} && make`);
  console.log(`  4. Create patch structure in patches/${result.chipId}/${result.versionId}/`);
}

export async function runExtractCli(argv: string[], deps: PipelineDeps = {}): Promise<number> {
  let source: FirmwareSource;
  let chipId: string;
  let versionId: string;
  let outputRoot: string;
  let verbose: boolean;
  try {
    const values = parseCliArgs(argv, OPTIONS);
    if (flagArg(values, 'help')) {
      console.log(EXTRACT_USAGE);
      return 0;
    }
    const sourceArg = stringArg(values, 'source');
    const chipArg = stringArg(values, 'chip');
    const versionArg = stringArg(values, 'version');
    if (!sourceArg || !chipArg || !versionArg) {
      const missing = missingList([!sourceArg && '--source', !chipArg && '--chip', !versionArg && '--version']);
      throw new UsageError(`Missing required arguments: ${missing}`);
    }
    source = await resolveSource(sourceArg, flagArg(values, 'image'));
    chipId = chipArg;
    versionId = versionArg;
    const output = stringArg(values, 'output');
    outputRoot = output ? path.resolve(output) : defaultOutputRoot();
    verbose = flagArg(values, 'verbose');
  } catch (e: unknown) {
    return usageFailure(getErrorMessage(e));
  }

  banner('BROADCOM FIRMWARE EXTRACTION').forEach(l => console.log(l));
  printStatus('info', `Source: ${describeSource(source)}`);

  try {
    const result = await runExtraction({ source, chipId, versionId, outputRoot, verbose }, deps);
    if (result.status === 'not-found') {
      for (const warning of result.warnings) printStatus('warning', warning);
      printStatus('error', 'Extraction failed at acquire step: no firmware files found');
      return 1;
    }
    printResult(result);
    if (result.status === 'partial-failure') {
      printStatus('error', 'Extraction finished with errors at scaffold step');
      return 1;
    }
    console.log('');
    printStatus('success', 'Firmware extraction complete!');
    return 0;
  } catch (e: unknown) {
    if (e instanceof UsageError) return usageFailure(e.message);
    if (e instanceof AcquisitionError) printStatus('error', `Extraction failed at ${e.step} step (${e.code}): ${e.message}`);
    else if (e instanceof ScaffoldError) printStatus('error', `Extraction failed at ${e.step} step: ${e.message}`);
    else if (e instanceof CatalogError) printStatus('error', `Chip catalog error: ${e.message}`);
    else printStatus('error', `Extraction failed: ${getErrorMessage(e)}`);
    return 1;
  }
}

if (require.main === module) {
  runExtractCli(process.argv.slice(2))
    .then(code => { process.exitCode = code; })
    .catch((e: unknown) => {
      console.error(`❌ ${getErrorMessage(e)}`);
      process.exitCode = 1;
    });
}
