import { ZodError } from 'zod';

export type ResolutionErrorType =
  | 'backendFailure'
  | 'cancelled'
  | 'timeout'
  | 'invalidName';

export class ResolutionError extends Error {
  type: ResolutionErrorType;
  fix: string;
  /** Backend result code (e.g. `ETIMEOUT`, `SERVFAIL`) when the backend gave one */
  code?: string;

  constructor(message: string, type: ResolutionErrorType, fix: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResolutionError';
    this.type = type;
    this.fix = fix;
    this.code = options?.code;
  }

  /**
   * Create a ResolutionError for a query the backend could not complete
   */
  static backendFailure(name: string, code: string, cause?: unknown): ResolutionError {
    return new ResolutionError(
      `Resolution of ${name} failed: ${code}`,
      'backendFailure',
      'The resolver could not complete the query. Check network access and SRV_DNS_SERVERS, then try again.',
      { code, cause }
    );
  }

  /**
   * Create a ResolutionError for a query cancelled by the caller
   */
  static cancelled(name: string): ResolutionError {
    return new ResolutionError(
      `Resolution of ${name} was cancelled`,
      'cancelled',
      'The query was cancelled before it completed. Issue it again if the result is still needed.'
    );
  }

  /**
   * Create a ResolutionError for a backend timeout
   */
  static timeout(name: string, timeoutMs: number): ResolutionError {
    return new ResolutionError(
      `Resolution of ${name} timed out after ${timeoutMs}ms`,
      'timeout',
      'The nameserver did not answer in time. Check SRV_DNS_SERVERS or increase SRV_QUERY_TIMEOUT.',
      { code: 'ETIMEOUT' }
    );
  }

  /**
   * Create a ResolutionError for a name that cannot be queried
   */
  static invalidName(name: string): ResolutionError {
    return new ResolutionError(
      `Invalid query name: "${name}"`,
      'invalidName',
      'Provide a non-empty domain name such as _sip._udp.example.com.'
    );
  }
}

/**
 * Render an error as the message/fix block printed by the CLI.
 */
export function formatCliError(error: Error): string {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const field = issue.path.join('.');
      return `  ${field}: ${issue.message}`;
    });
    return [
      'Configuration validation failed:',
      ...issues,
      '',
      'Fix: Check your environment variables.',
      'SRV_DNS_SERVERS takes comma-separated IP addresses, SRV_QUERY_TIMEOUT milliseconds, SRV_QUERY_TRIES 1-10.',
    ].join('\n');
  }

  if (error instanceof ResolutionError) {
    return [error.message, '', `Fix: ${error.fix}`].join('\n');
  }

  // Fallback
  return [`Unexpected error: ${error.message}`, '', 'Fix: Check your configuration and try again.'].join('\n');
}
