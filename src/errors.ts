export type DashboardErrorCode = 'READ_ERROR' | 'SCHEMA_ERROR' | 'MERGE_ERROR' | 'CONFIG_ERROR';

/**
 * Base class for structural failures. Row-level problems never throw; they
 * end up in the cleaning report instead.
 */
export class DashboardError extends Error {
  readonly code: DashboardErrorCode;

  constructor(code: DashboardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The file could not be opened or parsed as a workbook. */
export class ReadError extends DashboardError {
  readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super('READ_ERROR', `Cannot read ${source}: ${reason}`, { cause });
    this.source = source;
  }
}

/** The workbook opened but its sheet does not have the expected shape. */
export class SchemaError extends DashboardError {
  readonly source: string;
  readonly year: number;
  readonly missingFields: string[];

  constructor(source: string, year: number, message: string, missingFields: string[] = []) {
    super('SCHEMA_ERROR', `${source} (${year}): ${message}`);
    this.source = source;
    this.year = year;
    this.missingFields = missingFields;
  }
}

export class MergeError extends DashboardError {
  constructor(message: string) {
    super('MERGE_ERROR', message);
  }
}

export class ConfigError extends DashboardError {
  readonly issues: string[];

  constructor(file: string, issues: string[]) {
    super('CONFIG_ERROR', `Invalid config ${file}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
