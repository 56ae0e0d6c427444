import type { TapeRequest, TapeResponse } from '../types/index.js';
import type { Tape } from './tape.js';
import { cloneResponse } from './interaction.js';
import { NonWritableTapeError, SequentialTapeExhaustedError } from './errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Sends a request to the live endpoint. Transport adapters supply this.
 */
export type Forward = (request: TapeRequest, signal?: AbortSignal) => Promise<TapeResponse>;

export type InterceptSource = 'tape' | 'live' | 'bypass';

export interface InterceptResult {
  response: TapeResponse;
  source: InterceptSource;
}

export interface TapeInterceptorOptions {
  /** Hosts forwarded without touching the tape */
  ignoreHosts?: string[];
  /** Forward loopback requests without touching the tape */
  ignoreLocalhost?: boolean;
  logger?: Logger;
}

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]', '::1', '0.0.0.0']);

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Decides, per request, between playback, live forwarding with a recording
 * side effect, and rejection, according to the tape's mode.
 */
export class TapeInterceptor {
  private readonly tape: Tape;
  private readonly ignoredHosts: Set<string>;
  private readonly ignoreLocalhost: boolean;
  private readonly logger: Logger;

  constructor(tape: Tape, options: TapeInterceptorOptions = {}) {
    this.tape = tape;
    this.ignoredHosts = new Set((options.ignoreHosts ?? []).map((h) => h.toLowerCase()));
    this.ignoreLocalhost = options.ignoreLocalhost ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  getTape(): Tape {
    return this.tape;
  }

  shouldIgnore(request: TapeRequest): boolean {
    const host = hostOf(request.url);
    if (host === null) return false;
    if (this.ignoredHosts.has(host)) return true;
    return this.ignoreLocalhost && LOCAL_HOSTS.has(host);
  }

  /**
   * Handle one outgoing request. Matching, the live forward and the tape
   * mutation run as a single critical section on the tape.
   */
  async intercept(request: TapeRequest, forward: Forward, signal?: AbortSignal): Promise<InterceptResult> {
    if (this.shouldIgnore(request)) {
      this.logger.debug(`bypass ${request.method} ${request.url}`);
      return { response: await forward(request, signal), source: 'bypass' };
    }

    const tape = this.tape;

    return tape.exclusive(async () => {
      const policy = tape.getPolicy();

      const match = policy.canPlayback ? tape.findMatch(request) : null;
      if (match) {
        this.logger.debug(`play ${request.method} ${request.url} from "${tape.name}"`);
        return { response: cloneResponse(match.response), source: 'tape' };
      }

      if (!policy.canWrite) {
        throw this.rejection(request);
      }

      signal?.throwIfAborted();

      const target = policy.canPlayback ? -1 : tape.seek(request);
      const response = await forward(request, signal);

      // A forward that ignored cancellation still must not leave a recording behind
      signal?.throwIfAborted();

      if (target !== -1 && policy.writeStrategy === 'overwrite') {
        tape.overwrite(target, request, response);
        this.logger.debug(`overwrite #${target} ${request.method} ${request.url} on "${tape.name}"`);
      } else {
        tape.record(request, response);
        this.logger.debug(`record ${request.method} ${request.url} on "${tape.name}"`);
      }

      return { response, source: 'live' };
    });
  }

  private rejection(request: TapeRequest): NonWritableTapeError {
    const tape = this.tape;
    if (tape.isSequential()) {
      return new SequentialTapeExhaustedError(tape.name, tape.mode, tape.readCursor, tape.size(), request);
    }
    return new NonWritableTapeError(tape.name, tape.mode, request);
  }
}
