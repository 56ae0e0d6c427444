export const TapeMode = {
  READ_ONLY: 'READ_ONLY',
  READ_SEQUENTIAL: 'READ_SEQUENTIAL',
  READ_WRITE: 'READ_WRITE',
  WRITE_ONLY: 'WRITE_ONLY',
  WRITE_SEQUENTIAL: 'WRITE_SEQUENTIAL',
} as const;

export type TapeMode = (typeof TapeMode)[keyof typeof TapeMode];

export type MatchRuleName =
  | 'method'
  | 'uri'
  | 'host'
  | 'path'
  | 'port'
  | 'query'
  | 'headers'
  | 'body';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type HeaderMap = Record<string, string>;

export interface TapeRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body?: string;
}

export interface TapeResponse {
  status: number;
  headers: HeaderMap;
  body: string;
}

/**
 * One recorded exchange. Frozen on creation; a replacement is a new object.
 */
export interface Interaction {
  readonly recordedAt: Date;
  readonly request: Readonly<TapeRequest>;
  readonly response: Readonly<TapeResponse>;
}

/**
 * Plain, mode-free form of a tape as it is persisted.
 */
export interface TapeDocument {
  name: string;
  interactions: Interaction[];
}

export interface MatchingConfig {
  rules: MatchRuleName[];
  headers: string[];
}

export interface ProxyConfig {
  port: number;
  target?: string;
  /** Live forward timeout in milliseconds */
  timeout: number;
}

export interface RecorderConfig {
  tapeRoot: string;
  defaultMode: TapeMode;
  matchRules: MatchRuleName[];
  matchHeaders: string[];
  ignoreHosts: string[];
  ignoreLocalhost: boolean;
  logLevel: LogLevel;
  proxy: ProxyConfig;
}
