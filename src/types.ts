// Shared data model for detection, acquisition & scaffolding.

export type Confidence = 'exact' | 'likely';

export type SignatureKind = 'device-tree-model' | 'platform-properties' | 'kernel-log' | 'firmware-filename';

// Raw signals observed on the host during one detection run (never persisted)
export type DeviceSignature = Readonly<Partial<Record<SignatureKind, string>>>;

export interface FirmwareCandidate {
  versionId: string;
  relativePatchPath: string; // e.g. patches/bcm43455c0/7_45_206/nexmon/
  rank: number; // lower = preferred
  note: string;
}

export interface ChipProfile {
  chipId: string;
  displayName: string;
  candidates: readonly FirmwareCandidate[]; // catalog declaration order
}

export type StrategyId = 'device-tree' | 'platform-properties' | 'kernel-log' | 'firmware-files';

export interface ChipMatch {
  profile: ChipProfile;
  evidence: string; // what matched (board name, codename, log line, filename)
}

export interface DetectionResult {
  strategy: StrategyId;
  confidence: Confidence;
  matches: ChipMatch[]; // firmware-files may report several distinct chips
}

export interface DetectionAttempt {
  strategy: StrategyId;
  label: string;
  signature: DeviceSignature;
  details: string[]; // human readable observations for the report
  result?: DetectionResult;
  declinedReason?: string;
}

export interface DetectionOutcome {
  attempts: DetectionAttempt[];
  result?: DetectionResult; // undefined => inconclusive
}

export type FirmwareSource =
  | { kind: 'bridge' }
  | { kind: 'filesystem'; path: string }
  | { kind: 'image'; root: string };

export interface AcquiredBinary {
  filename: string;
  originPath: string;
  bytes: Buffer;
}

export interface TransferFailure {
  originPath: string;
  reason: string;
}

export interface AcquisitionOutcome {
  sourceLabel: string; // where the binaries came from (directory or device path)
  binaries: AcquiredBinary[]; // sorted by filename
  failures: TransferFailure[];
  warnings: string[];
}

export interface AcquireHints {
  chipId?: string;
  versionId?: string;
  stagingDir: string; // caller-owned scratch directory
  verbose?: boolean;
}

export type ExtractionStatus = 'success' | 'partial-failure' | 'not-found';

export interface ExtractionResult {
  readonly chipId: string;
  readonly versionId: string;
  readonly outputDir: string;
  readonly filesWritten: readonly string[];
  readonly status: ExtractionStatus;
  readonly warnings: readonly string[];
}

export interface ExtractionOptions {
  source: FirmwareSource;
  chipId: string;
  versionId: string;
  outputRoot: string;
  verbose?: boolean;
}
