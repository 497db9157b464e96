import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, unlink, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  Dispatcher,
  type ConversionOutcome,
  type ConversionRunner,
  type DispatcherDependencies,
} from '../../src/core/dispatcher.js';
import { resolveWatchConfig, type WatchConfigInput } from '../../src/config/watch-config.js';
import { ConversionPipeline } from '../../src/services/conversion-pipeline.js';
import { observeFile } from '../../src/services/file-observer.js';
import { ParseError, StartupError } from '../../src/types/errors.js';
import type { ConversionJob, ConversionResult } from '../../src/types/conversion.js';
import type { EventSource, FileEventKind, FileEventSink } from '../../src/types/file-watcher.js';
import { sleep, waitFor } from '../helpers.js';

/** Event source driven by the test. */
class ManualSource implements EventSource {
  readonly kind = 'notifier' as const;
  stopped = false;
  #sink: FileEventSink | null = null;

  constructor(private readonly targetId: string) {}

  async start(sink: FileEventSink): Promise<void> {
    this.#sink = sink;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  emit(kind: FileEventKind, filePath: string): void {
    this.#sink?.({ kind, path: filePath, targetId: this.targetId, timestamp: new Date().toISOString() });
  }
}

/** Runner whose jobs finish only when the test releases them. */
class GatedRunner implements ConversionRunner {
  readonly calls: ConversionJob[] = [];
  active = 0;
  maxActive = 0;
  #releases: (() => void)[] = [];

  async run(job: ConversionJob): Promise<ConversionResult> {
    this.calls.push(job);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise<void>((resolve) => this.#releases.push(resolve));
    this.active -= 1;
    return {
      status: 'converted',
      outputPath: job.outputPath,
      rowCount: 0,
      digest: 'test-digest',
      fingerprint: job.fingerprint,
      dialect: { delimiter: ',', quote: '"' },
    };
  }

  releaseAll(): void {
    for (const release of this.#releases.splice(0)) release();
  }
}

function nextOutcomes(dispatcher: Dispatcher, count: number): Promise<ConversionOutcome[]> {
  return new Promise((resolve) => {
    const seen: ConversionOutcome[] = [];
    const unsubscribe = dispatcher.onConversion((outcome) => {
      seen.push(outcome);
      if (seen.length === count) {
        unsubscribe();
        resolve(seen);
      }
    });
  });
}

let dir: string;
let dispatcher: Dispatcher | null = null;

async function startDispatcher(
  input: Partial<WatchConfigInput> = {},
  deps: Omit<DispatcherDependencies, 'config'> = {},
): Promise<{ dispatcher: Dispatcher; source: ManualSource }> {
  const config = resolveWatchConfig({ directories: [dir], quietPeriodMs: 50, ...input }, {});
  const source = new ManualSource(config.targets[0]?.id ?? dir);
  const created = new Dispatcher({
    config,
    startSource: async (sink) => {
      await source.start(sink);
      return source;
    },
    ...deps,
  });
  dispatcher = created;
  await created.start();
  return { dispatcher: created, source };
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'csvwatch-dispatch-'));
});

afterEach(async () => {
  await dispatcher?.drain(0);
  dispatcher = null;
  await rm(dir, { recursive: true, force: true });
});

describe('Dispatcher', () => {
  it('converts a file once it settles and ignores a later touch', async () => {
    const { dispatcher, source } = await startDispatcher();
    const file = path.join(dir, 'x.csv');
    await writeFile(file, 'a,b,c\n1,2,3\n');

    const first = nextOutcomes(dispatcher, 1);
    source.emit('created', file);
    const [converted] = await first;

    expect(converted?.result.status).toBe('converted');
    expect(await readFile(path.join(dir, 'x.json'), 'utf8')).toBe('[{"a":"1","b":"2","c":"3"}]');

    const later = new Date(Date.now() + 60_000);
    await utimes(file, later, later);
    const second = nextOutcomes(dispatcher, 1);
    source.emit('modified', file);
    const [touched] = await second;

    expect(touched?.result.status).toBe('unchanged');
    expect((await readdir(dir)).sort()).toEqual(['x.csv', 'x.json']);
    expect(dispatcher.stateOf(file)).toBe('idle');
    expect(dispatcher.getStatus().counters).toEqual({
      eventsReceived: 2,
      conversions: 1,
      unchanged: 1,
      failures: 0,
      raceAborts: 0,
    });
  });

  it('runs end to end on the polling source', async () => {
    const config = resolveWatchConfig(
      { directories: [dir], quietPeriodMs: 50, pollIntervalMs: 20, forcePolling: true, format: 'lines' },
      {},
    );
    const polling = new Dispatcher({ config });
    dispatcher = polling;
    await polling.start();
    expect(polling.getStatus()).toMatchObject({ state: 'running', sourceKind: 'polling' });

    const done = nextOutcomes(polling, 1);
    await writeFile(path.join(dir, 'orders.csv'), 'a,b,c\n1,2,3\n');
    const [outcome] = await done;

    expect(outcome?.result.status).toBe('converted');
    expect(await readFile(path.join(dir, 'orders.jsonl'), 'utf8')).toBe('{"a":"1","b":"2","c":"3"}\n');
  });

  it('converts files that already exist when asked to', async () => {
    await mkdir(path.join(dir, 'nested'));
    await writeFile(path.join(dir, 'a.csv'), 'k\n1\n');
    await writeFile(path.join(dir, 'nested', 'b.csv'), 'k\n2\n');
    const out = path.join(dir, 'out');

    const config = resolveWatchConfig(
      { directories: [dir], quietPeriodMs: 50, processExisting: true, recursive: true, outputDir: out },
      {},
    );
    const source = new ManualSource(config.targets[0]?.id ?? dir);
    const existing = new Dispatcher({
      config,
      startSource: async (sink) => {
        await source.start(sink);
        return source;
      },
    });
    dispatcher = existing;
    const done = nextOutcomes(existing, 2);
    await existing.start();
    await done;

    expect(await readFile(path.join(out, 'a.json'), 'utf8')).toBe('[{"k":"1"}]');
    expect(await readFile(path.join(out, 'nested', 'b.json'), 'utf8')).toBe('[{"k":"2"}]');
    expect(existing.getStatus().counters.conversions).toBe(2);
  });

  it('never runs two jobs for the same path at once', async () => {
    const runner = new GatedRunner();
    const { dispatcher, source } = await startDispatcher({}, { pipeline: runner });
    const file = path.join(dir, 'x.csv');
    await writeFile(file, 'a\n1\n');

    source.emit('created', file);
    await waitFor(() => runner.calls.length === 1);
    source.emit('modified', file);
    source.emit('modified', file);
    await sleep(150);

    expect(runner.calls).toHaveLength(1);
    expect(dispatcher.stateOf(file)).toBe('converting');
    expect(dispatcher.getStatus().inFlight).toBe(1);

    // Events seen mid-job send the path through the quiet period once more.
    runner.releaseAll();
    await waitFor(() => runner.calls.length === 2);
    expect(runner.maxActive).toBe(1);
    expect(runner.calls[1]?.previousDigest).toBe('test-digest');

    const done = nextOutcomes(dispatcher, 1);
    runner.releaseAll();
    await done;
    await sleep(150);

    expect(runner.calls).toHaveLength(2);
    expect(dispatcher.stateOf(file)).toBe('idle');
  });

  it('limits concurrent jobs to the worker count', async () => {
    const runner = new GatedRunner();
    const { dispatcher, source } = await startDispatcher({ workers: 2 }, { pipeline: runner });
    const files = ['a.csv', 'b.csv', 'c.csv'].map((name) => path.join(dir, name));
    for (const file of files) {
      await writeFile(file, 'a\n1\n');
      source.emit('created', file);
    }

    await waitFor(() => runner.calls.length === 2);
    await sleep(150);
    expect(runner.calls).toHaveLength(2);
    expect(dispatcher.getStatus()).toMatchObject({ inFlight: 2, pending: 1 });

    const done = nextOutcomes(dispatcher, 3);
    runner.releaseAll();
    await waitFor(() => runner.calls.length === 3);
    runner.releaseAll();
    await done;

    expect(runner.maxActive).toBe(2);
    expect(new Set(runner.calls.map((job) => job.sourcePath))).toEqual(new Set(files));
  });

  it('forgets a file deleted before it settles', async () => {
    const runner = new GatedRunner();
    const { dispatcher, source } = await startDispatcher({}, { pipeline: runner });
    const file = path.join(dir, 'x.csv');
    await writeFile(file, 'a\n1\n');

    source.emit('created', file);
    await unlink(file);
    source.emit('deleted', file);
    await sleep(200);

    expect(dispatcher.stateOf(file)).toBe('unseen');
    expect(runner.calls).toHaveLength(0);
  });

  it('does not retry an unparsable file until it changes', async () => {
    const { dispatcher, source } = await startDispatcher();
    const file = path.join(dir, 'broken.csv');
    await writeFile(file, Uint8Array.from([0x61, 0x0a, 0xff, 0x0a]));

    const done = nextOutcomes(dispatcher, 1);
    source.emit('created', file);
    const [failed] = await done;
    const result = failed?.result;

    expect(result?.status).toBe('failed');
    if (result?.status === 'failed') {
      expect(result.error).toBeInstanceOf(ParseError);
    }

    source.emit('modified', file);
    await sleep(200);
    expect(dispatcher.getStatus().counters).toMatchObject({ conversions: 0, failures: 1 });
    expect(dispatcher.stateOf(file)).toBe('idle');
    expect(await readdir(dir)).toEqual(['broken.csv']);
  });

  it('keeps a converted file idle when the stat after the job fails', async () => {
    const pipeline = new ConversionPipeline();
    let failNextStat = false;
    let failedStats = 0;
    const runner: ConversionRunner = {
      run: (job, signal) => {
        failNextStat = true;
        return pipeline.run(job, signal);
      },
    };
    const observe = async (filePath: string) => {
      if (failNextStat) {
        failNextStat = false;
        failedStats += 1;
        throw Object.assign(new Error('i/o error'), { code: 'EIO' });
      }
      return observeFile(filePath);
    };
    const { dispatcher, source } = await startDispatcher({}, { pipeline: runner, observe });
    const file = path.join(dir, 'x.csv');
    await writeFile(file, 'a\n1\n');

    const done = nextOutcomes(dispatcher, 1);
    source.emit('created', file);
    const [first] = await done;

    expect(first?.result.status).toBe('converted');
    expect(failedStats).toBe(1);
    expect(dispatcher.stateOf(file)).toBe('idle');

    source.emit('modified', file);
    await sleep(200);

    expect((await readdir(dir)).sort()).toEqual(['x.csv', 'x.json']);
    expect(dispatcher.getStatus().counters).toMatchObject({ conversions: 1, unchanged: 0 });
    expect(dispatcher.stateOf(file)).toBe('idle');
  });

  it('aborts jobs still running after the shutdown grace', async () => {
    let signalled = false;
    const stubborn: ConversionRunner = {
      run: (_job, signal) =>
        new Promise((resolve) => {
          signal?.addEventListener(
            'abort',
            () => {
              signalled = true;
              resolve({ status: 'abandoned' });
            },
            { once: true },
          );
        }),
    };
    const { dispatcher, source } = await startDispatcher({}, { pipeline: stubborn });
    const file = path.join(dir, 'x.csv');
    await writeFile(file, 'a\n1\n');
    source.emit('created', file);
    await waitFor(() => dispatcher.getStatus().inFlight === 1);

    const outcomes = nextOutcomes(dispatcher, 1);
    await dispatcher.drain(30);

    expect(signalled).toBe(true);
    expect(source.stopped).toBe(true);
    expect(dispatcher.state).toBe('stopped');
    const [abandoned] = await outcomes;
    expect(abandoned?.result).toEqual({ status: 'abandoned' });
  });

  it('ignores events once draining has begun', async () => {
    const { dispatcher, source } = await startDispatcher();
    await dispatcher.drain();

    source.emit('created', path.join(dir, 'late.csv'));
    expect(dispatcher.getStatus()).toMatchObject({ state: 'stopped', counters: { eventsReceived: 0 } });
  });

  it('stops cleanly when no event source can start', async () => {
    const config = resolveWatchConfig({ directories: [dir] }, {});
    const failing = new Dispatcher({
      config,
      startSource: async () => {
        throw new StartupError('No usable event source: test failure');
      },
    });

    await expect(failing.start()).rejects.toBeInstanceOf(StartupError);
    expect(failing.state).toBe('stopped');
  });

  it('refuses to start twice', async () => {
    const { dispatcher } = await startDispatcher();
    await expect(dispatcher.start()).rejects.toThrow("[Dispatcher] Cannot start from state 'running'.");
  });

  it('stops notifying listeners that unsubscribed', async () => {
    const { dispatcher, source } = await startDispatcher();
    const calls: ConversionOutcome[] = [];
    const unsubscribe = dispatcher.onConversion((outcome) => calls.push(outcome));
    unsubscribe();

    const file = path.join(dir, 'x.csv');
    await writeFile(file, 'a\n1\n');
    const done = nextOutcomes(dispatcher, 1);
    source.emit('created', file);
    await done;

    expect(calls).toEqual([]);
  });

  it('reports an idle status before starting', () => {
    const idle = new Dispatcher({ config: resolveWatchConfig({ directories: [dir] }, {}) });
    expect(idle.getStatus()).toEqual({
      state: 'idle',
      sourceKind: null,
      tracked: 0,
      inFlight: 0,
      pending: 0,
      counters: { eventsReceived: 0, conversions: 0, unchanged: 0, failures: 0, raceAborts: 0 },
    });
  });
});
