import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Recorder } from '../../src/core/recorder.js';
import { RequestPipeline } from '../../src/core/pipeline.js';
import { MemoryTapeStore } from '../../src/storage/memory.adapter.js';
import { parseTapeDocument } from '../../src/storage/tape-codec.js';
import { LifecycleConflictError, PersistenceError } from '../../src/core/errors.js';
import { silentLogger } from '../../src/utils/logger.js';
import type { Forward } from '../../src/core/interceptor.js';
import type { TapeRequest } from '../../src/types/index.js';

const STALE_TAPE = `!tape
name: stale tape
interactions:
- recorded: 2011-08-26T21:46:52.000Z
  request:
    method: GET
    url: http://localhost:5000/
    headers: {}
  response:
    status: 202
    headers: {}
    body: Previous response made when endpoint was down.
`;

const request: TapeRequest = { method: 'GET', url: 'http://localhost:5000/', headers: {} };

const forward = vi.fn<Forward>(async () => ({
  status: 200,
  headers: { 'content-type': 'text/plain' },
  body: 'Hello World!',
}));

describe('Recorder', () => {
  let store: MemoryTapeStore;
  let recorder: Recorder;

  beforeEach(() => {
    forward.mockClear();
    store = new MemoryTapeStore({ 'stale tape': STALE_TAPE });
    recorder = new Recorder({ store, logger: silentLogger });
  });

  afterEach(async () => {
    await recorder.stop();
  });

  describe('start', () => {
    it('should insert an empty tape when none is stored', async () => {
      const tape = await recorder.start('blank tape', 'READ_WRITE');

      expect(tape.name).toBe('blank tape');
      expect(tape.mode).toBe('READ_WRITE');
      expect(tape.size()).toBe(0);
      expect(recorder.isActive()).toBe(true);
      expect(recorder.currentTape()).toBe(tape);
      expect(recorder.getPipeline().isIntercepting()).toBe(true);
    });

    it('should load a stored tape', async () => {
      const tape = await recorder.start('stale tape', 'READ_ONLY');
      expect(tape.size()).toBe(1);
      expect(tape.interactionAt(0).response.status).toBe(202);
    });

    it('should use the configured default mode', async () => {
      const configured = new Recorder({ store, logger: silentLogger, config: { defaultMode: 'READ_ONLY' } });
      const tape = await configured.start('defaults');
      expect(tape.mode).toBe('READ_ONLY');
      await configured.stop();
    });

    it('should refuse a second start while active', async () => {
      await recorder.start('first', 'READ_WRITE');

      await expect(recorder.start('second', 'READ_WRITE')).rejects.toThrow(LifecycleConflictError);
      await expect(recorder.start('second', 'READ_WRITE')).rejects.toThrow(
        'Recorder is already active with tape "first"'
      );
      expect(recorder.currentTape().name).toBe('first');
    });

    it('should refuse a tape held by another recorder on the same store', async () => {
      const other = new Recorder({ store, logger: silentLogger });
      await recorder.start('shared', 'READ_WRITE');

      await expect(other.start('shared', 'READ_ONLY')).rejects.toThrow(
        'Tape "shared" is already in use by another session'
      );

      await recorder.stop();
      await expect(other.start('shared', 'READ_ONLY')).resolves.toBeDefined();
      await other.stop();
    });

    it('should refuse a pipeline that already intercepts for another session', async () => {
      const pipeline = new RequestPipeline();
      const first = new Recorder({ store, pipeline, logger: silentLogger });
      const second = new Recorder({ store, pipeline, logger: silentLogger });

      await first.start('one', 'READ_WRITE');
      await expect(second.start('two', 'READ_WRITE')).rejects.toThrow(
        'Pipeline already intercepting for tape "one"'
      );
      expect(second.isActive()).toBe(false);

      await first.stop();
      await expect(second.start('two', 'READ_WRITE')).resolves.toBeDefined();
      await second.stop();
    });

    it('should refuse a tape another recorder holds through its own store on the same root', async () => {
      const root = await mkdtemp(join(tmpdir(), 'tapedeck-lease-'));
      const first = new Recorder({ config: { tapeRoot: root }, logger: silentLogger });
      const second = new Recorder({ config: { tapeRoot: root }, logger: silentLogger });

      try {
        await first.start('shared', 'READ_WRITE');

        await expect(second.start('shared', 'READ_WRITE')).rejects.toThrow(
          'Tape "shared" is already in use by another session'
        );
        expect(second.isActive()).toBe(false);
      } finally {
        await first.stop();
        await rm(root, { recursive: true, force: true });
      }
    });

    it('should refuse a name that resolves to a file already held', async () => {
      const root = await mkdtemp(join(tmpdir(), 'tapedeck-lease-'));
      const first = new Recorder({ config: { tapeRoot: root }, logger: silentLogger });
      const second = new Recorder({ config: { tapeRoot: root }, logger: silentLogger });

      try {
        await first.start('write only tape', 'WRITE_ONLY');

        await expect(second.start('write-only-tape', 'WRITE_ONLY')).rejects.toThrow(LifecycleConflictError);

        await first.stop();
        await expect(second.start('write-only-tape', 'WRITE_ONLY')).resolves.toBeDefined();
      } finally {
        await first.stop();
        await second.stop();
        await rm(root, { recursive: true, force: true });
      }
    });

    it('should stay idle when the stored tape is malformed', async () => {
      store.write('broken', 'name: broken\n');

      await expect(recorder.start('broken', 'READ_ONLY')).rejects.toThrow(PersistenceError);
      expect(recorder.isActive()).toBe(false);
      await expect(recorder.start('blank', 'READ_ONLY')).resolves.toBeDefined();
    });
  });

  describe('stop', () => {
    it('should do nothing when no tape is inserted', async () => {
      await expect(recorder.stop()).resolves.toBeUndefined();
      expect(recorder.isActive()).toBe(false);
    });

    it('should wait for a start still loading the tape', async () => {
      const starting = recorder.start('racing', 'READ_WRITE');
      await recorder.stop();

      await expect(starting).resolves.toBeDefined();
      expect(recorder.isActive()).toBe(false);
      expect(recorder.getPipeline().isIntercepting()).toBe(false);
      expect(await store.exists('racing')).toBe(true);
    });

    it('should leave nothing to stop after a failed start', async () => {
      store.write('broken', 'name: broken\n');

      const starting = recorder.start('broken', 'READ_ONLY').catch((e: unknown) => e);
      await recorder.stop();

      expect(await starting).toBeInstanceOf(PersistenceError);
      expect(recorder.isActive()).toBe(false);
    });

    it('should share one save between concurrent stops', async () => {
      const save = vi.spyOn(store, 'save');
      await recorder.start('twice', 'READ_WRITE');

      await Promise.all([recorder.stop(), recorder.stop()]);

      expect(save).toHaveBeenCalledTimes(1);
    });

    it('should stop intercepting', async () => {
      await recorder.start('blank', 'READ_WRITE');
      await recorder.stop();

      expect(recorder.getPipeline().isIntercepting()).toBe(false);
      expect(() => recorder.currentTape()).toThrow('No tape is inserted; call start() first');

      const result = await recorder.getPipeline().dispatch(request, forward);
      expect(result.source).toBe('bypass');
    });

    describe('with a fixed clock', () => {
      beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2024-01-02T03:04:05.000Z'));
      });

      afterEach(() => {
        vi.useRealTimers();
      });

      it('should persist recordings of a writable tape', async () => {
        await recorder.start('blank', 'READ_WRITE');
        await recorder.getPipeline().dispatch(request, forward);
        await recorder.stop();

        expect(store.read('blank')).toBe(`!tape
name: blank
interactions:
- recorded: 2024-01-02T03:04:05.000Z
  request:
    method: GET
    url: http://localhost:5000/
    headers: {}
  response:
    status: 200
    headers: {content-type: text/plain}
    body: Hello World!
`);
      });
    });

    it('should persist an overwrite in WRITE_ONLY mode', async () => {
      await recorder.start('stale tape', 'WRITE_ONLY');
      await recorder.getPipeline().dispatch(request, forward);
      await recorder.stop();

      const saved = parseTapeDocument(store.read('stale tape') ?? '');
      expect(saved.interactions).toHaveLength(1);
      expect(saved.interactions[0].response.status).toBe(200);
      expect(saved.interactions[0].response.body).toBe('Hello World!');
    });

    it('should not save a read-only tape', async () => {
      const save = vi.spyOn(store, 'save');

      await recorder.start('stale tape', 'READ_ONLY');
      await recorder.getPipeline().dispatch(request, forward);
      await recorder.stop();

      expect(save).not.toHaveBeenCalled();
      expect(store.read('stale tape')).toBe(STALE_TAPE);
    });

    it('should wait for requests already in flight', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const slowForward = vi.fn<Forward>(async () => {
        await gate;
        return { status: 200, headers: {}, body: 'late' };
      });

      await recorder.start('in flight', 'READ_WRITE');
      const inflight = recorder.getPipeline().dispatch(request, slowForward);
      const stopping = recorder.stop();
      release();

      await Promise.all([inflight, stopping]);

      const saved = parseTapeDocument(store.read('in flight') ?? '');
      expect(saved.interactions).toHaveLength(1);
      expect(saved.interactions[0].response.body).toBe('late');
    });

    it('should report a failed save and end the session', async () => {
      vi.spyOn(store, 'save').mockRejectedValueOnce(new Error('disk full'));

      await recorder.start('doomed', 'READ_WRITE');
      const error = await recorder.stop().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ message: 'Failed to save tape "doomed": disk full', tapeName: 'doomed' });
      expect(recorder.isActive()).toBe(false);
    });
  });

  describe('withTape', () => {
    it('should return the result and stop afterwards', async () => {
      const size = await recorder.withTape('scoped', 'READ_WRITE', async (tape) => {
        await recorder.getPipeline().dispatch(request, forward);
        return tape.size();
      });

      expect(size).toBe(1);
      expect(recorder.isActive()).toBe(false);
      expect(parseTapeDocument(store.read('scoped') ?? '').interactions).toHaveLength(1);
    });

    it('should stop and rethrow when the body fails', async () => {
      await expect(
        recorder.withTape('failing', 'READ_WRITE', () => {
          throw new Error('test failed');
        })
      ).rejects.toThrow('test failed');

      expect(recorder.isActive()).toBe(false);
      expect(await store.exists('failing')).toBe(true);
    });
  });

  it('should expose merged configuration', () => {
    const configured = new Recorder({
      store,
      logger: silentLogger,
      config: { matchRules: ['method', 'path'], proxy: { port: 0 } },
    });

    const config = configured.getConfig();
    expect(config.matchRules).toEqual(['method', 'path']);
    expect(config.proxy).toEqual({ port: 0, target: undefined, timeout: 5000 });
    expect(configured.getStore()).toBe(store);
  });
});
