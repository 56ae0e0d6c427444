import { describe, it, expect } from 'vitest';
import { getPolicy, isTapeMode, parseTapeMode, TAPE_MODES } from '../../src/core/tape-mode.js';

describe('Tape modes', () => {
  it('should list all five modes', () => {
    expect(TAPE_MODES).toEqual([
      'READ_ONLY',
      'READ_SEQUENTIAL',
      'READ_WRITE',
      'WRITE_ONLY',
      'WRITE_SEQUENTIAL',
    ]);
  });

  describe('getPolicy', () => {
    it.each([
      ['READ_ONLY', true, false, 'unordered'],
      ['READ_SEQUENTIAL', true, false, 'ordered'],
      ['READ_WRITE', true, true, 'unordered'],
      ['WRITE_ONLY', false, true, 'unordered'],
      ['WRITE_SEQUENTIAL', false, true, 'unordered'],
    ] as const)('%s plays back: %s, writes: %s, scope: %s', (mode, canPlayback, canWrite, matchScope) => {
      const policy = getPolicy(mode);
      expect(policy.mode).toBe(mode);
      expect(policy.canPlayback).toBe(canPlayback);
      expect(policy.canWrite).toBe(canWrite);
      expect(policy.matchScope).toBe(matchScope);
    });

    it('should overwrite only in WRITE_ONLY mode', () => {
      const overwriting = TAPE_MODES.filter((mode) => getPolicy(mode).writeStrategy === 'overwrite');
      expect(overwriting).toEqual(['WRITE_ONLY']);
    });

    it('should settle on the latest match only in write modes', () => {
      const latest = TAPE_MODES.filter((mode) => getPolicy(mode).tieBreak === 'latest');
      expect(latest).toEqual(['WRITE_ONLY', 'WRITE_SEQUENTIAL']);
    });
  });

  describe('parseTapeMode', () => {
    it('should accept the canonical names', () => {
      expect(parseTapeMode('READ_SEQUENTIAL')).toBe('READ_SEQUENTIAL');
    });

    it('should accept kebab, camel and padded spellings', () => {
      expect(parseTapeMode('read-only')).toBe('READ_ONLY');
      expect(parseTapeMode('writeSequential')).toBe('WRITE_SEQUENTIAL');
      expect(parseTapeMode('  read write ')).toBe('READ_WRITE');
    });

    it('should return null for unknown modes', () => {
      expect(parseTapeMode('record')).toBeNull();
      expect(parseTapeMode('')).toBeNull();
    });
  });

  it('should recognise modes with isTapeMode', () => {
    expect(isTapeMode('WRITE_ONLY')).toBe(true);
    expect(isTapeMode('write_only')).toBe(false);
    expect(isTapeMode(3)).toBe(false);
  });
});
