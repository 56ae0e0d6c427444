import type { RecorderConfig, TapeMode } from '../types/index.js';
import type { TapeStore } from '../storage/base.js';
import { YamlFileTapeStore } from '../storage/yaml-file.adapter.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { mergeConfig, type ConfigOverrides } from '../config/loader.js';
import { Tape } from './tape.js';
import { RequestMatcher } from './matcher.js';
import { TapeInterceptor } from './interceptor.js';
import { RequestPipeline } from './pipeline.js';
import { LifecycleConflictError, PersistenceError, errorMessage } from './errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface RecorderOptions {
  config?: ConfigOverrides;
  /** Defaults to a YAML file store under `config.tapeRoot` */
  store?: TapeStore;
  /** Defaults to a pipeline owned by this recorder */
  pipeline?: RequestPipeline;
  logger?: Logger;
}

interface Session {
  tape: Tape;
  interceptor: TapeInterceptor;
  /** Store location of the tape, held until the session ends */
  location: string;
}

// Store locations of tapes bound to a session, across all recorders
const heldTapes = new Set<string>();

/**
 * Session manager: binds one tape and one interceptor at a time.
 */
export class Recorder {
  private config: RecorderConfig;
  private store: TapeStore;
  private pipeline: RequestPipeline;
  private logger: Logger;
  private session: Session | null = null;
  private starting: Promise<Tape> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: RecorderOptions = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options.config ?? {});
    this.store = options.store ?? new YamlFileTapeStore(this.config.tapeRoot);
    this.pipeline = options.pipeline ?? new RequestPipeline();
    this.logger = options.logger ?? createLogger(this.config.logLevel);
  }

  /**
   * Load (or create) the named tape under `mode` and start intercepting
   */
  async start(name: string, mode: TapeMode = this.config.defaultMode): Promise<Tape> {
    if (this.stopping) {
      throw new LifecycleConflictError('Recorder is still stopping the previous tape');
    }
    if (this.session || this.starting) {
      const active = this.session ? ` with tape "${this.session.tape.name}"` : '';
      throw new LifecycleConflictError(`Recorder is already active${active}`);
    }

    const location = this.store.locate(name);
    if (heldTapes.has(location)) {
      throw new LifecycleConflictError(`Tape "${name}" is already in use by another session`);
    }
    heldTapes.add(location);

    const starting = this.insert(name, mode, location);
    this.starting = starting;
    try {
      return await starting;
    } finally {
      this.starting = null;
    }
  }

  private async insert(name: string, mode: TapeMode, location: string): Promise<Tape> {
    try {
      const document = await this.store.load(name);
      const tape = Tape.fromDocument({ ...document, name }, mode, {
        matcher: new RequestMatcher({
          rules: this.config.matchRules,
          headers: this.config.matchHeaders,
        }),
      });
      const interceptor = new TapeInterceptor(tape, {
        ignoreHosts: this.config.ignoreHosts,
        ignoreLocalhost: this.config.ignoreLocalhost,
        logger: this.logger,
      });

      this.pipeline.install(interceptor);
      this.session = { tape, interceptor, location };
      this.logger.info(`Inserted tape "${name}" (${mode}, ${tape.size()} interactions)`);
      return tape;
    } catch (error) {
      heldTapes.delete(location);
      if (error instanceof PersistenceError) {
        this.logger.error(`Could not load tape "${name}"`, error);
      }
      throw error;
    }
  }

  /**
   * Stop intercepting and persist the tape when its mode can write.
   * Waits for a start still in progress; does nothing when no session is active.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    if (this.starting) {
      // A failed start is reported to its own caller and leaves nothing to stop
      const started = await this.starting.then(
        () => true,
        () => false
      );
      if (!started) {
        return;
      }
      if (this.stopping) {
        return this.stopping;
      }
    }

    const session = this.session;
    if (!session) {
      return;
    }

    const stopping = this.eject(session);
    this.stopping = stopping;
    try {
      await stopping;
    } finally {
      this.stopping = null;
    }
  }

  private async eject(session: Session): Promise<void> {
    const { tape, interceptor } = session;
    this.pipeline.uninstall(interceptor);

    try {
      // Wait for requests already inside the tape's critical section
      await tape.exclusive(async () => {
        if (tape.isWritable()) {
          await this.store.save(tape.toDocument());
        }
      });
      this.logger.info(`Ejected tape "${tape.name}" (${tape.size()} interactions)`);
    } catch (error) {
      this.logger.error(`Could not save tape "${tape.name}"`, error);
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(`Failed to save tape "${tape.name}": ${errorMessage(error)}`, tape.name, undefined, error);
    } finally {
      heldTapes.delete(session.location);
      this.session = null;
    }
  }

  /**
   * Run `fn` inside a session; the session is always stopped afterwards
   */
  async withTape<T>(name: string, mode: TapeMode, fn: (tape: Tape) => Promise<T> | T): Promise<T> {
    const tape = await this.start(name, mode);
    let result: T;
    try {
      result = await fn(tape);
    } catch (error) {
      try {
        await this.stop();
      } catch (stopError) {
        this.logger.error(`Tape "${name}" was not saved after a failed session`, stopError);
      }
      throw error;
    }
    await this.stop();
    return result;
  }

  currentTape(): Tape {
    if (!this.session) {
      throw new LifecycleConflictError('No tape is inserted; call start() first');
    }
    return this.session.tape;
  }

  isActive(): boolean {
    return this.session !== null;
  }

  getPipeline(): RequestPipeline {
    return this.pipeline;
  }

  getStore(): TapeStore {
    return this.store;
  }

  getConfig(): RecorderConfig {
    return { ...this.config, proxy: { ...this.config.proxy } };
  }
}
