/**
 * Raised when a training configuration is missing, unreadable or invalid.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = 1): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}
