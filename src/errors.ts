// Error taxonomy. Codes are stable strings so callers & tests can branch on them
// without matching message text.

export type AcquisitionErrorCode = 'SOURCE_UNAVAILABLE' | 'NO_FILES_FOUND' | 'PARTIAL_TRANSFER';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class AcquisitionError extends Error {
  readonly code: AcquisitionErrorCode;
  readonly step = 'acquire';

  constructor(code: AcquisitionErrorCode, message: string) {
    super(message);
    this.name = 'AcquisitionError';
    this.code = code;
  }
}

export class ScaffoldError extends Error {
  readonly step = 'scaffold';

  constructor(message: string) {
    super(message);
    this.name = 'ScaffoldError';
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

export function getErrorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
