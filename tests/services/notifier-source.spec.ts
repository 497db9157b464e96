import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { EventEmitter } from 'node:events';
import path from 'node:path';
import pino from 'pino';
import { NotifierSource } from '../../src/services/notifier-source.js';
import type { FileEvent, WatchTarget } from '../../src/types/file-watcher.js';

interface FakeWatcher extends EventEmitter {
  closed: boolean;
}

const chokidar = vi.hoisted(() => ({
  watchers: [] as { directory: string; options: Record<string, unknown>; watcher: FakeWatcher }[],
  failWith: null as Error | null,
}));

vi.mock('chokidar', async () => {
  const { EventEmitter } = await import('node:events');

  class Watcher extends EventEmitter {
    closed = false;

    async close(): Promise<void> {
      this.closed = true;
    }
  }

  return {
    watch: (directory: string, options: Record<string, unknown>) => {
      const watcher = new Watcher();
      chokidar.watchers.push({ directory, options, watcher });
      const failure = chokidar.failWith;
      process.nextTick(() => {
        if (failure) watcher.emit('error', failure);
        else watcher.emit('ready');
      });
      return watcher;
    },
  };
});

const ROOT = path.join(path.sep, 'inbox');
const TARGET: WatchTarget = { id: 'inbox', directory: ROOT, recursive: false };

function rawWatcher(index = 0): FakeWatcher {
  const entry = chokidar.watchers[index];
  if (!entry) throw new Error(`no watcher #${index}`);
  return entry.watcher;
}

describe('NotifierSource', () => {
  let events: FileEvent[];
  let source: NotifierSource;

  beforeEach(() => {
    chokidar.watchers.length = 0;
    chokidar.failWith = null;
    events = [];
    source = new NotifierSource([TARGET], { coalesceMs: 100 });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await source.stop();
  });

  it('watches each target without reporting files that already exist', async () => {
    const recursive = new NotifierSource([{ id: 'deep', directory: ROOT, recursive: true }]);
    await source.start((event) => events.push(event));
    await recursive.start(() => undefined);

    expect(chokidar.watchers[0]).toMatchObject({ directory: ROOT, options: { ignoreInitial: true, depth: 0 } });
    expect(chokidar.watchers[1]?.options.depth).toBeUndefined();
    expect(source.activeTargets()).toEqual(['inbox']);
    await recursive.stop();
  });

  it('logs a watcher failure after startup as an error naming the directory', async () => {
    const logger = pino({ level: 'silent' });
    const error = vi.spyOn(logger, 'error');
    const watched = new NotifierSource([TARGET], { logger });
    await watched.start(() => undefined);

    const failure = Object.assign(new Error('watch limit reached'), { code: 'ENOSPC' });
    rawWatcher().emit('error', failure);

    expect(error).toHaveBeenCalledWith(
      { err: failure, targetId: 'inbox', path: ROOT },
      'notifier: watcher failed; changes in this directory may go unreported',
    );
    await watched.stop();
  });

  it('reports created and deleted csv files straight away', async () => {
    await source.start((event) => events.push(event));
    const file = path.join(ROOT, 'orders.csv');

    rawWatcher().emit('add', file);
    rawWatcher().emit('unlink', file);

    expect(events.map((event) => [event.kind, event.path, event.targetId])).toEqual([
      ['created', file, 'inbox'],
      ['deleted', file, 'inbox'],
    ]);
  });

  it('ignores temporary and non-csv paths', async () => {
    await source.start((event) => events.push(event));

    rawWatcher().emit('add', path.join(ROOT, 'orders.csv.crdownload'));
    rawWatcher().emit('add', path.join(ROOT, '.~lock.orders.csv#'));
    rawWatcher().emit('add', path.join(ROOT, 'notes.txt'));

    expect(events).toEqual([]);
  });

  it('collapses a burst of modifications into one event', async () => {
    await source.start((event) => events.push(event));
    vi.useFakeTimers();
    const file = path.join(ROOT, 'orders.csv');

    rawWatcher().emit('change', file);
    rawWatcher().emit('change', file);
    vi.advanceTimersByTime(50);
    rawWatcher().emit('change', file);
    expect(events).toEqual([]);

    vi.advanceTimersByTime(50);
    expect(events.map((event) => event.kind)).toEqual(['modified']);

    vi.advanceTimersByTime(500);
    expect(events).toHaveLength(1);
  });

  it('drops a pending modification when the file is deleted', async () => {
    await source.start((event) => events.push(event));
    vi.useFakeTimers();
    const file = path.join(ROOT, 'orders.csv');

    rawWatcher().emit('change', file);
    rawWatcher().emit('unlink', file);
    vi.advanceTimersByTime(500);

    expect(events.map((event) => event.kind)).toEqual(['deleted']);
  });

  it('rejects start when the watcher fails before it is ready', async () => {
    chokidar.failWith = new Error('ENOSPC: System limit for number of file watchers reached');

    await expect(source.start(() => undefined)).rejects.toThrow('ENOSPC');
    expect(rawWatcher().closed).toBe(true);
    expect(source.activeTargets()).toEqual([]);
  });

  it('closes its watchers and drops pending events on stop', async () => {
    await source.start((event) => events.push(event));
    vi.useFakeTimers();

    rawWatcher().emit('change', path.join(ROOT, 'orders.csv'));
    await source.stop();
    vi.advanceTimersByTime(500);

    expect(rawWatcher().closed).toBe(true);
    expect(source.activeTargets()).toEqual([]);
    expect(events).toEqual([]);
  });

  it('refuses to start twice', async () => {
    await source.start(() => undefined);
    await expect(source.start(() => undefined)).rejects.toThrow('[NotifierSource] A notifier source cannot be started twice.');
  });
});
