#!/usr/bin/env node
// Detection report CLI. Inconclusive detection is a valid outcome: the process
// exits 0 whatever the probes find; only bad arguments exit non-zero.

import { ChipCatalog, getDefaultCatalog } from './catalog';
import { CliOptions, flagArg, parseCliArgs, stringArg } from './cli-args';
import { DetectionEngine } from './detection/engine';
import { UsageError, getErrorMessage } from './errors';
import { printStatus } from './format';
import { HostProbes, createHostProbes } from './probes';
import { REPORT_FORMATS, ReportFormat, isReportFormat, renderDetectionReport } from './report';

export const DETECT_USAGE = `Usage: brcm-fw-detect [OPTIONS]

Detects the Broadcom WiFi chip on this host and suggests firmware patches.

OPTIONS:
    -f, --format FORMAT     Report format: ${REPORT_FORMATS.join(', ')} (default: table)
        --verbose           Explain why each detection strategy declined
    -h, --help              Show this help message
`;

const OPTIONS: CliOptions = {
  format: { type: 'string', short: 'f' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' }
};

export interface DetectCliDeps {
  probes?: HostProbes;
  catalog?: ChipCatalog;
  catalogFile?: string; // read instead of the bundled catalog
}

export async function runDetectCli(argv: string[], deps: DetectCliDeps = {}): Promise<number> {
  let format: ReportFormat = 'table';
  let verbose = false;
  try {
    const values = parseCliArgs(argv, OPTIONS);
    if (flagArg(values, 'help')) {
      console.log(DETECT_USAGE);
      return 0;
    }
    const requested = stringArg(values, 'format');
    if (requested !== undefined) {
      if (!isReportFormat(requested)) throw new UsageError(`Unknown report format: ${requested}`);
      format = requested;
    }
    verbose = flagArg(values, 'verbose');
  } catch (e: unknown) {
    printStatus('error', getErrorMessage(e));
    console.log(DETECT_USAGE);
    return 1;
  }

  let catalog: ChipCatalog;
  try {
    catalog = deps.catalog || (deps.catalogFile ? ChipCatalog.load(deps.catalogFile) : getDefaultCatalog());
  } catch (e: unknown) {
    // nothing can be matched without a catalog: fall back to the manual steps
    printStatus('error', `Chip catalog error: ${getErrorMessage(e)}`);
    console.log(renderDetectionReport({ attempts: [] }, format));
    return 0;
  }
  const engine = new DetectionEngine({ catalog, verbose });
  const outcome = await engine.detect(deps.probes || createHostProbes());
  console.log(renderDetectionReport(outcome, format));
  return 0;
}

if (require.main === module) {
  runDetectCli(process.argv.slice(2))
    .then(code => { process.exitCode = code; })
    .catch((e: unknown) => {
      // still a report tool: surface the problem without failing the process
      console.error(`❌ Detection failed: ${getErrorMessage(e)}`);
    });
}
