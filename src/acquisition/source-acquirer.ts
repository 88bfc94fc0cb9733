import { ExecFn } from '../safe-exec';
import { AcquireHints, AcquisitionOutcome, FirmwareSource } from '../types';
import { BridgeAcquirer } from './bridge-acquirer';
import { FilesystemAcquirer } from './filesystem-acquirer';
import { ImageAcquirer } from './image-acquirer';

export interface AcquisitionStrategy {
  acquire(hints: AcquireHints): Promise<AcquisitionOutcome>;
}

export interface SourceAcquirerOptions {
  exec?: ExecFn; // command runner for the bridge
  bridgeCommand?: string;
}

export function describeSource(source: FirmwareSource): string {
  switch (source.kind) {
    case 'bridge': return 'connected device (bridge)';
    case 'filesystem': return `directory ${source.path}`;
    case 'image': return `image ${source.root}`;
  }
}

export class SourceAcquirer {
  constructor(private readonly options: SourceAcquirerOptions = {}) {}

  strategyFor(source: FirmwareSource): AcquisitionStrategy {
    switch (source.kind) {
      case 'bridge':
        return new BridgeAcquirer({ exec: this.options.exec, command: this.options.bridgeCommand });
      case 'filesystem':
        return new FilesystemAcquirer(source.path);
      case 'image':
        return new ImageAcquirer(source.root);
    }
  }

  // Rejects with AcquisitionError (SOURCE_UNAVAILABLE | NO_FILES_FOUND | PARTIAL_TRANSFER)
  async acquire(source: FirmwareSource, hints: AcquireHints): Promise<AcquisitionOutcome> {
    return this.strategyFor(source).acquire(hints);
  }
}
