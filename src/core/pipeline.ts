import type { TapeRequest } from '../types/index.js';
import type { Forward, InterceptResult, TapeInterceptor } from './interceptor.js';
import { LifecycleConflictError } from './errors.js';

/**
 * The slot transports dispatch through. Holds at most one interceptor;
 * with none installed requests go straight to the live endpoint.
 */
export class RequestPipeline {
  private interceptor: TapeInterceptor | null = null;

  install(interceptor: TapeInterceptor): void {
    if (this.interceptor && this.interceptor !== interceptor) {
      throw new LifecycleConflictError(
        `Pipeline already intercepting for tape "${this.interceptor.getTape().name}"`
      );
    }
    this.interceptor = interceptor;
  }

  uninstall(interceptor: TapeInterceptor): boolean {
    if (this.interceptor !== interceptor) {
      return false;
    }
    this.interceptor = null;
    return true;
  }

  getInterceptor(): TapeInterceptor | null {
    return this.interceptor;
  }

  isIntercepting(): boolean {
    return this.interceptor !== null;
  }

  async dispatch(request: TapeRequest, forward: Forward, signal?: AbortSignal): Promise<InterceptResult> {
    const interceptor = this.interceptor;
    if (!interceptor) {
      return { response: await forward(request, signal), source: 'bypass' };
    }
    return interceptor.intercept(request, forward, signal);
  }
}
