import type { RecorderConfig } from '../types/index.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: RecorderConfig = {
  tapeRoot: './tapes',
  defaultMode: 'READ_WRITE',
  matchRules: ['method', 'uri'],
  matchHeaders: [],
  ignoreHosts: [],
  ignoreLocalhost: false,
  logLevel: 'info',
  proxy: {
    port: 5555,
    target: undefined,
    timeout: 5000,
  },
};

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'tapedeck.config.yml',
  'tapedeck.config.yaml',
  'tapedeck.yml',
  'tapedeck.yaml',
  '.tapedeckrc.yml',
  '.tapedeckrc.yaml',
];
