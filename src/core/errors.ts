/**
 * Standardized exit codes for migrakit
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  PARSE_CONFIG_ERROR = 4,
  MIGRATION_EXISTS = 5,
  INVALID_MIGRATION_NAME = 6
}

/**
 * Base class for migrakit errors with exit codes
 */
export class MigrakitError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode) {
    super(message);
    this.exitCode = exitCode;
    this.name = this.constructor.name;
  }
}

/**
 * Config file could not be read, parsed or validated
 */
export class ParseConfigError extends MigrakitError {
  constructor(message: string, public readonly path?: string) {
    super(message, ExitCode.PARSE_CONFIG_ERROR);
  }
}

/**
 * A migration file about to be written already exists
 */
export class MigrationExistsError extends MigrakitError {
  constructor(public readonly filepath: string) {
    super(`Migration file already exists: ${filepath}`, ExitCode.MIGRATION_EXISTS);
  }
}

/**
 * Migration description or file name is not usable
 */
export class InvalidMigrationNameError extends MigrakitError {
  constructor(public readonly migrationName: string, reason: string) {
    super(`Invalid migration name "${migrationName}": ${reason}`, ExitCode.INVALID_MIGRATION_NAME);
  }
}

export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return "Success";
    case ExitCode.GENERAL_ERROR:
      return "Unexpected error";
    case ExitCode.PARSE_CONFIG_ERROR:
      return "Parse or configuration error";
    case ExitCode.MIGRATION_EXISTS:
      return "Migration file already exists";
    case ExitCode.INVALID_MIGRATION_NAME:
      return "Invalid migration name";
    default:
      return "Unknown error";
  }
}

/**
 * Format exit codes for help text
 */
export function formatExitCodesHelp(): string {
  const codes = [
    ExitCode.SUCCESS,
    ExitCode.GENERAL_ERROR,
    ExitCode.PARSE_CONFIG_ERROR,
    ExitCode.MIGRATION_EXISTS,
    ExitCode.INVALID_MIGRATION_NAME
  ];

  return codes
    .map(code => `  ${code} - ${getExitCodeDescription(code)}`)
    .join("\n");
}
