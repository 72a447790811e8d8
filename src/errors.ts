/**
 * Error thrown when a rules file cannot be parsed or validated,
 * or when a rule's instructions file cannot be read.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly ruleName?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when a git command fails during change detection
 */
export class GitDiffError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stderr?: string,
  ) {
    super(message);
    this.name = 'GitDiffError';
  }
}

/** Error thrown by the review pipeline for unsupported input or write failures */
export class ReviewToolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReviewToolError';
  }
}

/** Error thrown for a review id that cannot name a marker file */
export class ReviewIdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReviewIdError';
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
