/**
 * Error hierarchy for a sync run. Each error keeps an optional context record
 * and the underlying cause so the CLI can print one line per failure.
 */
export class SyncError extends Error {
  public context?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.context = options?.context;
  }
}

/**
 * Missing or invalid environment configuration.
 */
export class ConfigurationError extends SyncError {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message, { context: { problems } });
  }
}

/**
 * A Jira REST call failed or returned a non-2xx status.
 */
export class JiraApiError extends SyncError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      endpoint?: string;
      context?: Record<string, unknown>;
    },
  ) {
    super(message, options);
    this.statusCode = options?.statusCode;
    this.endpoint = options?.endpoint;
  }
}

/**
 * Reading or writing one vault file failed.
 */
export class FileSystemError extends SyncError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: 'read' | 'write',
    cause?: unknown,
  ) {
    super(message, { cause, context: { path, operation } });
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
