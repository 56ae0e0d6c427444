import { TapeMode } from '../types/index.js';

export type MatchScope = 'ordered' | 'unordered';
export type WriteStrategy = 'overwrite' | 'append';
export type TieBreak = 'earliest' | 'latest';

/**
 * What a mode allows. Interception looks these up instead of branching on
 * the mode name.
 */
export interface TapeModePolicy {
  readonly mode: TapeMode;
  readonly canPlayback: boolean;
  readonly canWrite: boolean;
  readonly matchScope: MatchScope;
  /** How a live response is stored when the request already had a match */
  readonly writeStrategy: WriteStrategy;
  /** Which of several matching interactions an unordered search settles on */
  readonly tieBreak: TieBreak;
}

const POLICIES: Record<TapeMode, TapeModePolicy> = {
  READ_ONLY: {
    mode: TapeMode.READ_ONLY,
    canPlayback: true,
    canWrite: false,
    matchScope: 'unordered',
    writeStrategy: 'append',
    tieBreak: 'earliest',
  },
  READ_SEQUENTIAL: {
    mode: TapeMode.READ_SEQUENTIAL,
    canPlayback: true,
    canWrite: false,
    matchScope: 'ordered',
    writeStrategy: 'append',
    tieBreak: 'earliest',
  },
  READ_WRITE: {
    mode: TapeMode.READ_WRITE,
    canPlayback: true,
    canWrite: true,
    matchScope: 'unordered',
    writeStrategy: 'append',
    tieBreak: 'earliest',
  },
  WRITE_ONLY: {
    mode: TapeMode.WRITE_ONLY,
    canPlayback: false,
    canWrite: true,
    matchScope: 'unordered',
    writeStrategy: 'overwrite',
    tieBreak: 'latest',
  },
  WRITE_SEQUENTIAL: {
    mode: TapeMode.WRITE_SEQUENTIAL,
    canPlayback: false,
    canWrite: true,
    matchScope: 'unordered',
    writeStrategy: 'append',
    tieBreak: 'latest',
  },
};

export const TAPE_MODES: readonly TapeMode[] = Object.values(TapeMode);

export function isTapeMode(value: unknown): value is TapeMode {
  return typeof value === 'string' && TAPE_MODES.some((mode) => mode === value);
}

export function getPolicy(mode: TapeMode): TapeModePolicy {
  return POLICIES[mode];
}

/**
 * Accepts `READ_ONLY`, `read-only`, `readOnly` and similar spellings.
 */
export function parseTapeMode(value: string): TapeMode | null {
  const normalized = value
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toUpperCase();
  return isTapeMode(normalized) ? normalized : null;
}
