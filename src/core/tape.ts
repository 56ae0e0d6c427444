import type {
  Interaction,
  TapeDocument,
  TapeMode,
  TapeRequest,
  TapeResponse,
} from '../types/index.js';
import { createInteraction } from './interaction.js';
import { RequestMatcher } from './matcher.js';
import { TapeLock } from './lock.js';
import { NonWritableTapeError } from './errors.js';
import { getPolicy, type TapeModePolicy } from './tape-mode.js';

export interface TapeOptions {
  matcher?: RequestMatcher;
  /** Clock for new recordings */
  now?: () => Date;
}

/**
 * Ordered log of interactions for one named session, bound to a mode.
 */
export class Tape {
  readonly name: string;
  readonly mode: TapeMode;
  private readonly policy: TapeModePolicy;
  private readonly matcher: RequestMatcher;
  private readonly now: () => Date;
  private readonly lock = new TapeLock();
  private interactions: Interaction[];
  private cursor = 0;
  private dirty = false;

  constructor(
    name: string,
    mode: TapeMode,
    interactions: readonly Interaction[] = [],
    options: TapeOptions = {}
  ) {
    this.name = name;
    this.mode = mode;
    this.policy = getPolicy(mode);
    this.matcher = options.matcher ?? new RequestMatcher();
    this.now = options.now ?? (() => new Date());
    this.interactions = [...interactions];
  }

  static fromDocument(document: TapeDocument, mode: TapeMode, options: TapeOptions = {}): Tape {
    return new Tape(document.name, mode, document.interactions, options);
  }

  toDocument(): TapeDocument {
    return { name: this.name, interactions: [...this.interactions] };
  }

  getPolicy(): TapeModePolicy {
    return this.policy;
  }

  get readCursor(): number {
    return this.cursor;
  }

  isReadable(): boolean {
    return this.policy.canPlayback;
  }

  isWritable(): boolean {
    return this.policy.canWrite;
  }

  isSequential(): boolean {
    return this.policy.matchScope === 'ordered';
  }

  /**
   * Whether anything was recorded or overwritten since the tape was loaded
   */
  isDirty(): boolean {
    return this.dirty;
  }

  size(): number {
    return this.interactions.length;
  }

  interactionAt(index: number): Interaction {
    const interaction = this.interactions[index];
    if (interaction === undefined) {
      throw new RangeError(`No interaction at index ${index} on tape "${this.name}" (size ${this.size()})`);
    }
    return interaction;
  }

  getInteractions(): readonly Interaction[] {
    return [...this.interactions];
  }

  /**
   * Index of the interaction that answers this request, or -1.
   * Ordered tapes only look at the cursor position. Never moves the cursor.
   */
  seek(request: TapeRequest): number {
    if (this.policy.matchScope === 'ordered') {
      const candidate = this.interactions[this.cursor];
      return candidate !== undefined && this.matcher.matches(request, candidate.request)
        ? this.cursor
        : -1;
    }

    if (this.policy.tieBreak === 'latest') {
      for (let i = this.interactions.length - 1; i >= 0; i--) {
        if (this.matcher.matches(request, this.interactions[i].request)) {
          return i;
        }
      }
      return -1;
    }

    return this.interactions.findIndex((interaction) =>
      this.matcher.matches(request, interaction.request)
    );
  }

  /**
   * Matching interaction under this tape's mode. Ordered tapes advance the
   * cursor past a successful match.
   */
  findMatch(request: TapeRequest): Interaction | null {
    const index = this.seek(request);
    if (index === -1) {
      return null;
    }
    if (this.policy.matchScope === 'ordered') {
      this.cursor = index + 1;
    }
    return this.interactions[index];
  }

  record(request: TapeRequest, response: TapeResponse): Interaction {
    this.assertWritable();
    const interaction = createInteraction(request, response, this.now());
    this.interactions.push(interaction);
    this.dirty = true;
    return interaction;
  }

  overwrite(index: number, request: TapeRequest, response: TapeResponse): Interaction {
    this.assertWritable();
    if (!Number.isInteger(index) || index < 0 || index >= this.interactions.length) {
      throw new RangeError(`Cannot overwrite index ${index} on tape "${this.name}" (size ${this.size()})`);
    }
    const interaction = createInteraction(request, response, this.now());
    this.interactions[index] = interaction;
    this.dirty = true;
    return interaction;
  }

  /**
   * Run `fn` as one critical section against every other caller on this tape
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.run(fn);
  }

  /**
   * Requests holding or queued on the tape's lock
   */
  pendingOperations(): number {
    return this.lock.pending();
  }

  private assertWritable(): void {
    if (!this.policy.canWrite) {
      throw new NonWritableTapeError(this.name, this.mode);
    }
  }
}
