import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { RecorderConfig, ProxyConfig, MatchRuleName } from '../types/index.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from './defaults.js';
import { isTapeMode, parseTapeMode, TAPE_MODES } from '../core/tape-mode.js';
import { ConfigError, errorMessage } from '../core/errors.js';
import { isLogLevel, LOG_LEVELS } from '../utils/logger.js';

const MATCH_RULE_NAMES: readonly MatchRuleName[] = [
  'method',
  'uri',
  'host',
  'path',
  'port',
  'query',
  'headers',
  'body',
];

/**
 * Configuration file structure (YAML format)
 */
const ConfigFileSchema = z.object({
  tapes: z
    .object({
      root: z.string().optional(),
      defaultMode: z.string().optional(),
    })
    .optional(),
  matching: z
    .object({
      rules: z.array(z.string()).optional(),
      headers: z.array(z.string()).optional(),
    })
    .optional(),
  ignore: z
    .object({
      hosts: z.array(z.string()).optional(),
      localhost: z.boolean().optional(),
    })
    .optional(),
  proxy: z
    .object({
      port: z.number().int().optional(),
      target: z.string().optional(),
      timeout: z.number().optional(),
    })
    .optional(),
  logLevel: z.string().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Programmatic options that override the config file
 */
export type ConfigOverrides = Partial<Omit<RecorderConfig, 'proxy'>> & {
  proxy?: Partial<ProxyConfig>;
  /** Explicit config file; a missing file is then an error */
  configPath?: string;
};

/**
 * Find config file in the start directory or any parent directory
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Load and parse a YAML config file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    throw new ConfigError(`Failed to read config file: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${errorMessage(error)}`);
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${filePath}: ${errors.join('; ')}`, errors);
  }
  return result.data;
}

function isMatchRuleName(value: string): value is MatchRuleName {
  return MATCH_RULE_NAMES.some((name) => name === value);
}

/**
 * Convert config file structure to RecorderConfig values
 */
export function configFileToRecorderConfig(file: ConfigFile): ConfigOverrides {
  const config: ConfigOverrides = {};

  if (file.tapes?.root !== undefined) {
    config.tapeRoot = file.tapes.root;
  }

  if (file.tapes?.defaultMode !== undefined) {
    const mode = parseTapeMode(file.tapes.defaultMode);
    if (mode === null) {
      throw new ConfigError(
        `Invalid tape mode: ${file.tapes.defaultMode}. Must be one of: ${TAPE_MODES.join(', ')}.`
      );
    }
    config.defaultMode = mode;
  }

  if (file.matching?.rules !== undefined) {
    const unknown = file.matching.rules.filter((rule) => !isMatchRuleName(rule));
    if (unknown.length > 0) {
      throw new ConfigError(
        `Unknown match rule(s): ${unknown.join(', ')}. Must be: ${MATCH_RULE_NAMES.join(', ')}.`
      );
    }
    config.matchRules = file.matching.rules.filter(isMatchRuleName);
  }

  if (file.matching?.headers !== undefined) {
    config.matchHeaders = file.matching.headers;
  }

  if (file.ignore?.hosts !== undefined) {
    config.ignoreHosts = file.ignore.hosts;
  }

  if (file.ignore?.localhost !== undefined) {
    config.ignoreLocalhost = file.ignore.localhost;
  }

  if (file.proxy !== undefined) {
    config.proxy = { ...file.proxy };
  }

  if (file.logLevel !== undefined) {
    if (!isLogLevel(file.logLevel)) {
      throw new ConfigError(`Invalid log level: ${file.logLevel}. Must be: ${LOG_LEVELS.join(', ')}.`);
    }
    config.logLevel = file.logLevel;
  }

  return config;
}

/**
 * Merge config objects (source overrides target)
 */
export function mergeConfig(target: RecorderConfig, source: ConfigOverrides): RecorderConfig {
  return {
    tapeRoot: source.tapeRoot ?? target.tapeRoot,
    defaultMode: source.defaultMode ?? target.defaultMode,
    matchRules: source.matchRules ?? target.matchRules,
    matchHeaders: source.matchHeaders ?? target.matchHeaders,
    ignoreHosts: source.ignoreHosts ?? target.ignoreHosts,
    ignoreLocalhost: source.ignoreLocalhost ?? target.ignoreLocalhost,
    logLevel: source.logLevel ?? target.logLevel,
    proxy: {
      port: source.proxy?.port ?? target.proxy.port,
      target: source.proxy?.target ?? target.proxy.target,
      timeout: source.proxy?.timeout ?? target.proxy.timeout,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: RecorderConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.tapeRoot.trim() === '') {
    errors.push('Tape root must not be empty.');
  }

  if (!isTapeMode(config.defaultMode)) {
    errors.push(`Invalid tape mode: ${config.defaultMode}. Must be one of: ${TAPE_MODES.join(', ')}.`);
  }

  if (config.matchRules.length === 0) {
    errors.push('At least one match rule is required.');
  }

  for (const rule of config.matchRules) {
    if (!isMatchRuleName(rule)) {
      errors.push(`Unknown match rule: ${rule}.`);
    }
  }

  if (config.matchHeaders.some((name) => name.trim() === '')) {
    errors.push('Match header names must not be empty.');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`Invalid log level: ${config.logLevel}. Must be: ${LOG_LEVELS.join(', ')}.`);
  }

  // Port 0 asks the OS for a free port
  if (!Number.isInteger(config.proxy.port) || config.proxy.port < 0 || config.proxy.port > 65535) {
    errors.push(`Invalid proxy port: ${config.proxy.port}. Must be between 0 and 65535.`);
  }

  if (!(config.proxy.timeout > 0)) {
    errors.push(`Invalid proxy timeout: ${config.proxy.timeout}. Must be greater than 0.`);
  }

  if (config.proxy.target !== undefined) {
    try {
      new URL(config.proxy.target);
    } catch {
      errors.push(`Invalid proxy target URL: ${config.proxy.target}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Load configuration from file and overrides
 * Priority: overrides > config file > defaults
 */
export async function loadConfig(
  overrides: ConfigOverrides = {},
  startDir: string = process.cwd()
): Promise<RecorderConfig> {
  let fileConfig: ConfigOverrides = {};

  const configPath = overrides.configPath ?? (await findConfigFile(startDir));

  if (configPath) {
    fileConfig = configFileToRecorderConfig(await loadConfigFile(configPath));
  }

  // Merge: defaults <- file <- overrides
  const merged = mergeConfig(mergeConfig(DEFAULT_CONFIG, fileConfig), overrides);

  const validation = validateConfig(merged);
  if (!validation.valid) {
    throw new ConfigError(`Invalid configuration: ${validation.errors.join(' ')}`, validation.errors);
  }

  return merged;
}
