/**
 * Missing or invalid configuration, or a configured path that does not
 * exist. Fatal: raised before any processing starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Front matter that could not be parsed
 */
export class DocumentParseError extends Error {
  constructor(
    message: string,
    readonly filePath?: string
  ) {
    super(message);
    this.name = 'DocumentParseError';
  }
}

/**
 * The ledger file could not be read, is structurally invalid, or lacks a
 * row the caller expected.
 */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}
