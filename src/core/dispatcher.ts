import { ConversionPipeline } from '../services/conversion-pipeline.js';
import { scanTarget, type ScannedFile } from '../services/directory-scan.js';
import { startEventSource } from '../services/event-source.js';
import { observeFile } from '../services/file-observer.js';
import { IntakeQueue } from '../services/intake-queue.js';
import { deriveOutputPath } from '../services/output-path.js';
import { StabilityGate } from '../services/stability-gate.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { ParseError, StartupError, WriteError, errorMessage, isRaceError } from '../types/errors.js';
import type { WatchConfig } from '../config/watch-config.js';
import type { ConversionJob, ConversionResult } from '../types/conversion.js';
import type { EventSource, EventSourceKind, FileEvent, FileEventSink, WatchTarget } from '../types/file-watcher.js';
import type { FileObservation, GateState, JobCompletion } from '../types/stability.js';

export type DispatcherState = 'idle' | 'starting' | 'running' | 'draining' | 'stopped';

/** Anything that can run a conversion job. `ConversionPipeline` is the real one. */
export interface ConversionRunner {
    run(job: ConversionJob, signal?: AbortSignal): Promise<ConversionResult>;
}

export interface DispatcherCounters {
    eventsReceived: number;
    conversions: number;
    unchanged: number;
    failures: number;
    raceAborts: number;
}

export interface DispatcherStatus {
    state: DispatcherState;
    sourceKind: EventSourceKind | null;
    /** Paths the stability gate currently tracks. */
    tracked: number;
    inFlight: number;
    /** Stable paths waiting for a free worker. */
    pending: number;
    counters: DispatcherCounters;
}

/** Delivered to `onConversion` listeners once per finished job. */
export interface ConversionOutcome {
    path: string;
    targetId: string;
    result: ConversionResult;
}

export type ConversionListener = (outcome: ConversionOutcome) => void;

export interface DispatcherDependencies {
    config: WatchConfig;
    /** Starts the event source. Defaults to notifier with polling fallback. */
    startSource?: (sink: FileEventSink) => Promise<EventSource>;
    pipeline?: ConversionRunner;
    observe?: (filePath: string) => Promise<FileObservation | null>;
    now?: () => number;
    logger?: Logger;
}

type IntakeItem =
    | { type: 'event'; event: FileEvent }
    | { type: 'recheck'; path: string; targetId: string }
    | { type: 'completed'; job: ConversionJob; targetId: string; result: ConversionResult };

interface ReadyPath {
    path: string;
    targetId: string;
}

/**
 * Process-wide control loop.
 *
 * Event sources, re-check timers and finished jobs only push items onto the
 * intake queue; one loop consumes it and is the only code that touches the
 * stability gate. A path is never converted twice at the same time: the gate
 * keeps it in `converting` and the in-flight map holds its job.
 */
export class Dispatcher {
    readonly #config: WatchConfig;
    readonly #targets: Map<string, WatchTarget>;
    readonly #gate: StabilityGate;
    readonly #pipeline: ConversionRunner;
    readonly #startSource: (sink: FileEventSink) => Promise<EventSource>;
    readonly #observe: (filePath: string) => Promise<FileObservation | null>;
    readonly #now: () => number;
    readonly #log: Logger;
    readonly #queue = new IntakeQueue<IntakeItem>();
    readonly #rechecks: Map<string, NodeJS.Timeout> = new Map();
    readonly #ready: ReadyPath[] = [];
    readonly #inFlight: Map<string, Promise<void>> = new Map();
    readonly #abort = new AbortController();
    readonly #listeners: Set<ConversionListener> = new Set();
    readonly #counters: DispatcherCounters = {
        eventsReceived: 0,
        conversions: 0,
        unchanged: 0,
        failures: 0,
        raceAborts: 0,
    };
    #state: DispatcherState = 'idle';
    #source: EventSource | null = null;
    #loop: Promise<void> | null = null;
    #draining: Promise<void> | null = null;

    constructor(deps: DispatcherDependencies) {
        const { config } = deps;
        this.#config = config;
        this.#targets = new Map(config.targets.map((target) => [target.id, target]));
        this.#log = deps.logger ?? componentLogger('dispatcher');
        this.#gate = new StabilityGate({
            quietPeriodMs: config.quietPeriodMs,
            maxIdleEntries: config.maxIdleEntries,
        });
        this.#pipeline = deps.pipeline ?? new ConversionPipeline();
        this.#observe = deps.observe ?? observeFile;
        this.#now = deps.now ?? Date.now;
        this.#startSource =
            deps.startSource ??
            ((sink) =>
                startEventSource(
                    {
                        targets: config.targets,
                        pollIntervalMs: config.pollIntervalMs,
                        coalesceMs: config.coalesceMs,
                        forcePolling: config.forcePolling,
                    },
                    sink,
                ));
    }

    get state(): DispatcherState {
        return this.#state;
    }

    /**
     * Start the loop, queue pre-existing files when configured, then bring the
     * event source up. Rejects with `StartupError` when no source can start.
     */
    async start(): Promise<void> {
        if (this.#state !== 'idle') {
            throw new Error(`[Dispatcher] Cannot start from state '${this.#state}'.`);
        }
        this.#state = 'starting';
        this.#loop = this.#consume();

        let source: EventSource;
        try {
            if (this.#config.processExisting) {
                await this.#enqueueExisting();
            }
            source = await this.#startSource((event) => this.#accept(event));
        } catch (err) {
            await this.drain(0);
            throw err;
        }

        if (this.#state !== 'starting') {
            // drain() ran while the source was starting up.
            await source.stop();
            return;
        }
        this.#source = source;
        this.#state = 'running';
        this.#log.info(
            {
                source: source.kind,
                targets: this.#config.targets.map((t) => t.directory),
                quietPeriodMs: this.#config.quietPeriodMs,
                workers: this.#config.workers,
            },
            'dispatcher: running',
        );
        this.#pump();
    }

    /**
     * Stop accepting events, let running jobs finish for up to `timeoutMs`,
     * then abort the rest. Resolves once the loop has exited.
     */
    drain(timeoutMs: number = this.#config.shutdownGraceMs): Promise<void> {
        if (this.#state === 'stopped') return Promise.resolve();
        this.#draining ??= this.#shutdown(timeoutMs);
        return this.#draining;
    }

    stop(): Promise<void> {
        return this.drain();
    }

    getStatus(): DispatcherStatus {
        return {
            state: this.#state,
            sourceKind: this.#source?.kind ?? null,
            tracked: this.#gate.count(),
            inFlight: this.#inFlight.size,
            pending: this.#ready.length,
            counters: { ...this.#counters },
        };
    }

    /** Gate state of one path. */
    stateOf(filePath: string): GateState | 'unseen' {
        return this.#gate.stateOf(filePath);
    }

    /** Subscribe to job outcomes. Returns the unsubscribe function. */
    onConversion(listener: ConversionListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #accept(event: FileEvent): void {
        if (this.#state !== 'starting' && this.#state !== 'running') return;
        this.#counters.eventsReceived += 1;
        this.#queue.push({ type: 'event', event });
    }

    async #enqueueExisting(): Promise<void> {
        for (const target of this.#config.targets) {
            let files: ScannedFile[];
            try {
                files = await scanTarget(target, this.#log);
            } catch (err) {
                throw new StartupError(`Cannot list ${target.directory}: ${errorMessage(err)}`, { cause: err });
            }
            for (const file of files) {
                this.#accept({
                    kind: 'created',
                    path: file.path,
                    targetId: file.targetId,
                    timestamp: new Date().toISOString(),
                });
            }
            this.#log.info({ path: target.directory, count: files.length }, 'dispatcher: queued existing files');
        }
    }

    async #consume(): Promise<void> {
        for await (const item of this.#queue) {
            try {
                if (item.type === 'completed') {
                    await this.#handleCompleted(item.job, item.targetId, item.result);
                } else if (item.type === 'event') {
                    await this.#handleObservation(item.event.path, item.event.targetId);
                } else {
                    await this.#handleObservation(item.path, item.targetId);
                }
            } catch (err) {
                this.#log.error({ err, item: item.type }, 'dispatcher: failed to handle intake item');
            }
        }
    }

    async #handleObservation(filePath: string, targetId: string): Promise<void> {
        if (this.#state === 'draining' || this.#state === 'stopped') return;
        if (!this.#targets.has(targetId)) return;

        const observation = await this.#observeSafely(filePath);
        if (observation === undefined) return;

        const decision = this.#gate.observe(filePath, observation, this.#now());
        this.#log.trace({ path: filePath, outcome: decision.outcome }, 'dispatcher: observed');

        switch (decision.outcome) {
            case 'observing':
                if (decision.recheckInMs === undefined) {
                    this.#cancelRecheck(filePath);
                } else {
                    this.#scheduleRecheck(filePath, targetId, decision.recheckInMs);
                }
                break;
            case 'stable':
                this.#cancelRecheck(filePath);
                if (!this.#ready.some((entry) => entry.path === filePath)) {
                    this.#ready.push({ path: filePath, targetId });
                }
                this.#pump();
                break;
            case 'discarded':
                this.#cancelRecheck(filePath);
                break;
            default:
                break;
        }
    }

    async #handleCompleted(job: ConversionJob, targetId: string, result: ConversionResult): Promise<void> {
        const filePath = job.sourcePath;
        this.#inFlight.delete(filePath);
        this.#record(job, result);

        const completion: JobCompletion = {
            fingerprint: job.fingerprint,
            digest: result.status === 'converted' || result.status === 'unchanged' ? result.digest : undefined,
            raced: result.status === 'abandoned' || (result.status === 'failed' && isRaceError(result.error)),
            retryable: result.status === 'failed' && result.error instanceof WriteError,
        };
        const current = await this.#observeSafely(filePath);
        const outcome = this.#gate.complete(filePath, completion, current, this.#now());

        if (outcome === 'reobserve' || outcome === 'unverified') {
            this.#scheduleRecheck(filePath, targetId, this.#gate.quietPeriodMs);
        } else {
            this.#cancelRecheck(filePath);
        }

        this.#notify({ path: filePath, targetId, result });
        this.#pump();
    }

    /** Start jobs for ready paths while workers are free. */
    #pump(): void {
        while (this.#inFlight.size < this.#config.workers) {
            if (this.#state !== 'starting' && this.#state !== 'running') return;
            const next = this.#ready.shift();
            if (!next) return;
            if (this.#inFlight.has(next.path)) continue;

            const target = this.#targets.get(next.targetId);
            const claimed = target ? this.#gate.claim(next.path) : undefined;
            if (!target || !claimed) continue;

            const job: ConversionJob = {
                sourcePath: claimed.path,
                watchRoot: target.directory,
                fingerprint: claimed.fingerprint,
                outputPath: deriveOutputPath(
                    claimed.path,
                    target.directory,
                    this.#config.outputDir ?? target.directory,
                    this.#config.format,
                ),
                format: this.#config.format,
                indent: this.#config.indent,
                dialect: this.#config.dialect,
                encoding: this.#config.encoding,
                overwrite: this.#config.overwrite,
                previousDigest: claimed.previousDigest,
            };

            this.#log.debug({ path: job.sourcePath, output: job.outputPath }, 'dispatcher: converting');
            const running = this.#pipeline
                .run(job, this.#abort.signal)
                .catch((err: unknown): ConversionResult => ({
                    status: 'failed',
                    error: err instanceof Error ? err : new Error(String(err)),
                }))
                .then((result) => {
                    this.#queue.push({ type: 'completed', job, targetId: target.id, result });
                });
            this.#inFlight.set(job.sourcePath, running);
        }
    }

    #record(job: ConversionJob, result: ConversionResult): void {
        const path = job.sourcePath;
        switch (result.status) {
            case 'converted':
                this.#counters.conversions += 1;
                this.#log.info(
                    { path, output: result.outputPath, rows: result.rowCount, delimiter: result.dialect.delimiter },
                    'dispatcher: converted',
                );
                break;
            case 'unchanged':
                this.#counters.unchanged += 1;
                this.#log.debug({ path }, 'dispatcher: content unchanged; no new output');
                break;
            case 'abandoned':
                this.#log.debug({ path }, 'dispatcher: job abandoned during shutdown');
                break;
            case 'failed':
                if (isRaceError(result.error)) {
                    this.#counters.raceAborts += 1;
                    this.#log.debug({ path, reason: result.error.message }, 'dispatcher: source changed; re-observing');
                } else if (result.error instanceof ParseError) {
                    this.#counters.failures += 1;
                    this.#log.warn({ path, reason: result.error.message }, 'dispatcher: conversion failed');
                } else {
                    this.#counters.failures += 1;
                    this.#log.error({ path, err: result.error }, 'dispatcher: conversion failed');
                }
                break;
        }
    }

    #notify(outcome: ConversionOutcome): void {
        for (const listener of this.#listeners) {
            try {
                listener(outcome);
            } catch (err) {
                this.#log.warn({ err, path: outcome.path }, 'dispatcher: conversion listener threw');
            }
        }
    }

    /** `undefined` when the stat failed for a reason other than the file being gone. */
    async #observeSafely(filePath: string): Promise<FileObservation | null | undefined> {
        try {
            return await this.#observe(filePath);
        } catch (err) {
            this.#log.warn({ err, path: filePath }, 'dispatcher: cannot stat file');
            return undefined;
        }
    }

    #scheduleRecheck(filePath: string, targetId: string, delayMs: number): void {
        this.#cancelRecheck(filePath);
        if (this.#state !== 'starting' && this.#state !== 'running') return;

        const timer = setTimeout(() => {
            this.#rechecks.delete(filePath);
            this.#queue.push({ type: 'recheck', path: filePath, targetId });
        }, delayMs);
        this.#rechecks.set(filePath, timer);
    }

    #cancelRecheck(filePath: string): void {
        const timer = this.#rechecks.get(filePath);
        if (timer) {
            clearTimeout(timer);
            this.#rechecks.delete(filePath);
        }
    }

    #clearRechecks(): void {
        for (const timer of this.#rechecks.values()) {
            clearTimeout(timer);
        }
        this.#rechecks.clear();
    }

    async #shutdown(timeoutMs: number): Promise<void> {
        this.#state = 'draining';
        this.#ready.length = 0;
        this.#clearRechecks();

        const source = this.#source;
        if (source) {
            try {
                await source.stop();
            } catch (err) {
                this.#log.warn({ err, source: source.kind }, 'dispatcher: event source did not stop cleanly');
            }
        }

        const running = [...this.#inFlight.values()];
        if (running.length > 0) {
            this.#log.info({ inFlight: running.length, timeoutMs }, 'dispatcher: waiting for running jobs');
            const finished = await settlesWithin(Promise.allSettled(running), timeoutMs);
            if (!finished) {
                this.#log.warn({ inFlight: this.#inFlight.size }, 'dispatcher: aborting jobs after shutdown grace');
                this.#abort.abort();
                await Promise.allSettled(running);
            }
        }

        this.#queue.close();
        await this.#loop;
        this.#inFlight.clear();
        this.#clearRechecks();
        this.#state = 'stopped';
        this.#log.info({ counters: this.#counters }, 'dispatcher: stopped');
    }
}

/** Resolves `true` if `promise` settles within `timeoutMs`, `false` otherwise. */
async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
        return await Promise.race([promise.then(() => true), expired]);
    } finally {
        clearTimeout(timer);
    }
}
