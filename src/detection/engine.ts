import { ChipCatalog, getDefaultCatalog } from '../catalog';
import { getErrorMessage } from '../errors';
import { HostProbes } from '../probes';
import { DetectionAttempt, DetectionOutcome } from '../types';
import { DETECTION_STRATEGIES, DetectionStrategy } from './strategies';

export interface DetectionEngineOptions {
  catalog?: ChipCatalog;
  strategies?: readonly DetectionStrategy[];
  verbose?: boolean;
}

export class DetectionEngine {
  private readonly catalog: ChipCatalog;
  private readonly strategies: readonly DetectionStrategy[];
  private readonly verbose: boolean;

  constructor(options: DetectionEngineOptions = {}) {
    this.catalog = options.catalog || getDefaultCatalog();
    this.strategies = options.strategies || DETECTION_STRATEGIES;
    this.verbose = !!options.verbose;
  }

  // Strategies run one at a time in priority order; the first result wins
  async detect(probes: HostProbes): Promise<DetectionOutcome> {
    const attempts: DetectionAttempt[] = [];
    for (const strategy of this.strategies) {
      const attempt = await this.runStrategy(strategy, probes);
      attempts.push(attempt);
      if (attempt.result) return { attempts, result: attempt.result };
    }
    return { attempts };
  }

  private async runStrategy(strategy: DetectionStrategy, probes: HostProbes): Promise<DetectionAttempt> {
    try {
      const verdict = await strategy.tryDetect(probes, this.catalog);
      if (this.verbose && verdict.declinedReason) {
        console.warn(`⚠️  ${strategy.id} declined: ${verdict.declinedReason}`);
      }
      return { strategy: strategy.id, label: strategy.label, ...verdict };
    } catch (e: unknown) {
      // a misbehaving probe must not abort lower-priority strategies
      if (this.verbose) console.warn(`⚠️  ${strategy.id} failed: ${getErrorMessage(e)}`);
      return {
        strategy: strategy.id,
        label: strategy.label,
        signature: {},
        details: [],
        declinedReason: `probe error: ${getErrorMessage(e)}`
      };
    }
  }
}
