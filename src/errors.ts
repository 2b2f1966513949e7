export type VendorPackageErrorCode =
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'TARGET_EXISTS'
  | 'TARGET_MISSING'
  | 'WRITE_ERROR'
  | 'CONFIG_ERROR';

export class VendorPackageError extends Error {
  public readonly code: VendorPackageErrorCode;

  constructor(code: VendorPackageErrorCode, message: string) {
    super(message);
    this.name = 'VendorPackageError';
    this.code = code;
  }
}

export class NotFoundError extends VendorPackageError {
  public readonly path: string;

  constructor(path: string, what = 'File') {
    super('NOT_FOUND', `${what} not found: ${path}`);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

export class ParseError extends VendorPackageError {
  public readonly path: string;
  public readonly field?: string;

  constructor(path: string, message: string, field?: string) {
    super(
      'PARSE_ERROR',
      field
        ? `Error parsing '${path}': ${field}: ${message}`
        : `Error parsing '${path}': ${message}`
    );
    this.name = 'ParseError';
    this.path = path;
    this.field = field;
  }
}

export class TargetExistsError extends VendorPackageError {
  public readonly outputDir: string;

  constructor(outputDir: string) {
    super(
      'TARGET_EXISTS',
      `Output directory '${outputDir}' is not empty and does not hold a vendor package generated for this library`
    );
    this.name = 'TargetExistsError';
    this.outputDir = outputDir;
  }
}

export class TargetMissingError extends VendorPackageError {
  public readonly outputDir: string;

  constructor(outputDir: string, reason = 'does not exist') {
    super('TARGET_MISSING', `Output directory '${outputDir}' ${reason}`);
    this.name = 'TargetMissingError';
    this.outputDir = outputDir;
  }
}

export class WriteError extends VendorPackageError {
  public readonly path: string;
  public readonly writtenFiles: string[];

  constructor(path: string, cause: string, writtenFiles: string[]) {
    super(
      'WRITE_ERROR',
      writtenFiles.length > 0
        ? `Failed to write '${path}': ${cause} (already written: ${writtenFiles.join(', ')})`
        : `Failed to write '${path}': ${cause}`
    );
    this.name = 'WriteError';
    this.path = path;
    this.writtenFiles = writtenFiles;
  }
}

export class ConfigError extends VendorPackageError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super('CONFIG_ERROR', `Invalid configuration '${path}': ${message}`);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
