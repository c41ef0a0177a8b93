/**
 * Harvester Error Handling
 * Startup failures that are allowed to stop the process
 */

export type HarvesterErrorCode = 'CONFIG_ERROR' | 'DATA_ERROR' | 'STORAGE_ERROR';

export class HarvesterException extends Error {
  public readonly code: HarvesterErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: HarvesterErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HarvesterException';
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: HarvesterErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

// Pre-defined error factories
export const HarvesterErrors = {
  invalidConfig: (fieldErrors: Record<string, string[] | undefined>) =>
    new HarvesterException('CONFIG_ERROR', 'Invalid environment configuration', {
      fieldErrors,
    }),

  invalidCityTable: (source: string, reason: string) =>
    new HarvesterException('DATA_ERROR', `City table ${source} is invalid: ${reason}`, {
      source,
    }),

  storageUnavailable: (path: string, cause: unknown) =>
    new HarvesterException(
      'STORAGE_ERROR',
      `Cannot prepare houses log at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { path }
    ),
};

/**
 * Format any thrown value as a one-line diagnostic
 */
export function formatError(error: unknown): string {
  if (error instanceof HarvesterException) {
    return `${error.code}: ${error.message}`;
  }

  return error instanceof Error ? error.message : 'An unexpected error occurred';
}
