/**
 * Caller-facing resolver: dispatches queries to a backend and hands back
 * ordered results.
 */
import { createLogger, type Logger } from '../config/logger.js';
import { RecordClass, RecordType } from '../dns/constants.js';
import { encodeName } from '../dns/name.js';
import { ResolutionError } from '../errors.js';
import type { RandomSource } from '../srv/select.js';
import { ResolutionSession } from './session.js';
import type { CancelResult, ResolutionCallback, ResolutionOutcome, ResolverBackend, SessionState } from './types.js';

export interface ResolverOptions {
  logger?: Logger;
  /** Random source for SRV weight ordering */
  random?: RandomSource;
}

/** A query that has been dispatched and may still be running */
export class ActiveQuery {
  constructor(
    private readonly session: ResolutionSession,
    private readonly backend: ResolverBackend,
    private readonly logger: Logger
  ) {}

  get name(): string {
    return this.session.name;
  }

  get state(): SessionState {
    return this.session.state;
  }

  /**
   * Ask the backend to stop. A query that already finished is left as is;
   * a backend that cannot stop the query leaves it running.
   */
  cancel(): CancelResult {
    if (this.session.terminated) {
      return 'completed';
    }
    if (!this.backend.cancel(this.session)) {
      this.logger.warn({ name: this.session.name, backend: this.backend.name }, 'Backend could not cancel query');
      return 'unsupported';
    }
    this.session.cancel();
    return 'cancelled';
  }
}

export class DnsResolver {
  private readonly backend: ResolverBackend;
  private readonly logger: Logger;
  private readonly random: RandomSource | undefined;

  constructor(backend: ResolverBackend, options: ResolverOptions = {}) {
    this.backend = backend;
    this.logger = options.logger ?? createLogger('silent');
    this.random = options.random;
  }

  /**
   * Dispatch a query; `callback` runs exactly once with the outcome.
   * @throws ResolutionError when `name` is not a valid domain name
   */
  resolveAsync(name: string, rrType: number, rrClass: number, callback: ResolutionCallback): ActiveQuery {
    if (!isQueryableName(name)) {
      throw ResolutionError.invalidName(name);
    }

    const session = new ResolutionSession({ name, rrType, rrClass, logger: this.logger, random: this.random }, callback);
    this.logger.debug({ name, rrType, rrClass, backend: this.backend.name }, 'Dispatching query');

    const fail = (error: unknown): void => {
      session.fail(
        error instanceof ResolutionError
          ? error
          : ResolutionError.backendFailure(name, error instanceof Error ? error.message : String(error), error)
      );
    };

    try {
      const pending = this.backend.resolve(session);
      if (pending instanceof Promise) {
        pending.catch(fail);
      }
    } catch (error) {
      fail(error);
    }

    return new ActiveQuery(session, this.backend, this.logger);
  }

  /**
   * Resolve and wait for the outcome. Never rejects: backend failures and
   * invalid names come back as `{ ok: false }`.
   */
  resolve(name: string, rrType: number = RecordType.SRV, rrClass: number = RecordClass.IN): Promise<ResolutionOutcome> {
    return new Promise((resolve) => {
      try {
        this.resolveAsync(name, rrType, rrClass, resolve);
      } catch (error) {
        if (!(error instanceof ResolutionError)) throw error;
        resolve({ ok: false, name, error });
      }
    });
  }
}

function isQueryableName(name: string): boolean {
  if (name.length === 0 || name === '.') {
    return false;
  }
  try {
    encodeName(name);
    return true;
  } catch {
    return false;
  }
}
