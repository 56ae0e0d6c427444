import type {
  TapeRequest,
  HeaderMap,
  MatchRuleName,
  MatchingConfig,
} from '../types/index.js';

/**
 * Compares a live request with a recorded one
 */
export type MatchRule = (live: TapeRequest, recorded: TapeRequest) => boolean;

export const DEFAULT_MATCH_RULES: MatchRuleName[] = ['method', 'uri'];

const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443',
  'ws:': '80',
  'wss:': '443',
};

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Compare a URL component; unparsable URLs fall back to comparing the raw text
 */
function urlPart(pick: (url: URL) => string): MatchRule {
  return (live, recorded) => {
    const a = parseUrl(live.url);
    const b = parseUrl(recorded.url);
    if (!a || !b) {
      return live.url === recorded.url;
    }
    return pick(a) === pick(b);
  };
}

function effectivePort(url: URL): string {
  return url.port || (DEFAULT_PORTS[url.protocol] ?? '');
}

function sortedQuery(url: URL): string {
  return [...url.searchParams.entries()]
    .sort(([ak, av], [bk, bv]) => (ak === bk ? av.localeCompare(bv) : ak.localeCompare(bk)))
    .map(([key, value]) => `${key}=${value}`)
    .join('&');
}

function lowerCaseKeys(headers: HeaderMap): HeaderMap {
  const result: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * Header comparison. With a declared subset only those names count,
 * otherwise both maps must be equal. Names are case-insensitive.
 */
export function headerRule(names: string[] = []): MatchRule {
  const subset = names.map((name) => name.toLowerCase());

  return (live, recorded) => {
    const a = lowerCaseKeys(live.headers);
    const b = lowerCaseKeys(recorded.headers);

    if (subset.length > 0) {
      return subset.every((name) => a[name] === b[name]);
    }

    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
  };
}

export const MatchRules: Record<Exclude<MatchRuleName, 'headers'>, MatchRule> = {
  method: (live, recorded) => live.method.toUpperCase() === recorded.method.toUpperCase(),
  uri: (live, recorded) => live.url === recorded.url,
  host: urlPart((url) => url.hostname),
  path: urlPart((url) => url.pathname),
  port: urlPart(effectivePort),
  query: urlPart(sortedQuery),
  body: (live, recorded) => (live.body ?? '') === (recorded.body ?? ''),
};

export function composeRules(rules: MatchRule[]): MatchRule {
  return (live, recorded) => rules.every((rule) => rule(live, recorded));
}

export class RequestMatcher {
  private config: MatchingConfig;
  private rule: MatchRule;

  constructor(config: Partial<MatchingConfig> = {}) {
    this.config = {
      rules: config.rules ?? DEFAULT_MATCH_RULES,
      headers: config.headers ?? [],
    };

    // A declared header subset is part of the key even when 'headers' is not listed
    const names =
      this.config.headers.length > 0 && !this.config.rules.includes('headers')
        ? [...this.config.rules, 'headers' as const]
        : this.config.rules;

    this.rule = composeRules(
      names.map((name) => (name === 'headers' ? headerRule(this.config.headers) : MatchRules[name]))
    );
  }

  matches(live: TapeRequest, recorded: TapeRequest): boolean {
    return this.rule(live, recorded);
  }

  getConfig(): MatchingConfig {
    return { rules: [...this.config.rules], headers: [...this.config.headers] };
  }
}
