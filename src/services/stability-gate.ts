import { isCandidatePath } from './path-filter.js';
import type { Fingerprint } from '../types/file-watcher.js';
import type {
    CandidateFile,
    CompletionOutcome,
    FileObservation,
    GateDecision,
    GateState,
    JobCompletion,
    StabilityGateOptions,
} from '../types/stability.js';

const DEFAULTS = {
    quietPeriodMs: 1250,
    maxIdleEntries: 10_000,
};

/** Snapshot handed to the dispatcher when it claims a stable path. */
export interface ClaimedFile {
    path: string;
    fingerprint: Fingerprint;
    previousDigest?: string;
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
    return a.size === b.size && a.mtimeMs === b.mtimeMs;
}

/**
 * Per-path quiet-period state machine.
 *
 * The gate never touches the filesystem and never reads the clock: the
 * dispatcher stats the file, passes the observation and the current time in,
 * and acts on the returned decision. All calls must come from one loop.
 *
 * A path is promoted to `stable` when two consecutive observations carry the
 * same size and mtime, at least `quietPeriodMs` passed between them, and the
 * file is non-empty and readable.
 */
export class StabilityGate {
    readonly #quietPeriodMs: number;
    readonly #maxIdleEntries: number;
    readonly #files: Map<string, CandidateFile> = new Map();

    constructor(options: StabilityGateOptions = {}) {
        this.#quietPeriodMs = Math.max(0, Math.floor(options.quietPeriodMs ?? DEFAULTS.quietPeriodMs));
        this.#maxIdleEntries = Math.max(0, Math.floor(options.maxIdleEntries ?? DEFAULTS.maxIdleEntries));
    }

    get quietPeriodMs(): number {
        return this.#quietPeriodMs;
    }

    /**
     * Feed one observation of `filePath`. `null` means the file no longer exists.
     */
    observe(filePath: string, observation: FileObservation | null, now: number): GateDecision {
        if (!isCandidatePath(filePath)) {
            return { outcome: 'ignored' };
        }

        const entry = this.#files.get(filePath);

        if (entry?.state === 'converting') {
            // The job's completion re-stats the file and decides what happens next.
            entry.touchedDuringJob = true;
            return { outcome: 'deferred' };
        }

        if (!observation) {
            this.#files.delete(filePath);
            return { outcome: 'discarded' };
        }

        if (!entry) {
            const created: CandidateFile = {
                path: filePath,
                state: 'observing',
                size: observation.size,
                mtimeMs: observation.mtimeMs,
                readable: observation.readable,
                firstSeenAt: now,
                observedAt: now,
                unchangedCount: 0,
            };
            this.#files.set(filePath, created);
            return this.#waiting(created);
        }

        if (entry.state === 'idle') {
            if (entry.lastAttemptFingerprint && sameFingerprint(entry.lastAttemptFingerprint, observation)) {
                return { outcome: 'unchanged' };
            }
            this.#restart(entry, observation, now);
            return this.#waiting(entry);
        }

        if (entry.state === 'stable' && sameFingerprint(entry, observation)) {
            return { outcome: 'stable' };
        }

        return this.#advance(entry, observation, now);
    }

    /** Move a stable path to `converting`. Returns `undefined` if it is not stable any more. */
    claim(filePath: string): ClaimedFile | undefined {
        const entry = this.#files.get(filePath);
        if (!entry || entry.state !== 'stable') return undefined;

        entry.state = 'converting';
        entry.touchedDuringJob = false;
        return {
            path: entry.path,
            fingerprint: { size: entry.size, mtimeMs: entry.mtimeMs },
            previousDigest: entry.lastDigest,
        };
    }

    /**
     * Close out a job. `current` is a fresh stat taken after the job finished:
     * `null` when the file is gone, `undefined` when the stat itself failed.
     *
     * Returns `reobserve` when the file changed or was reported during the job,
     * or the job lost a race; `dropped` when the file is gone; `unverified` when
     * the stat failed; `idle` otherwise.
     */
    complete(
        filePath: string,
        completion: JobCompletion,
        current: FileObservation | null | undefined,
        now: number,
    ): CompletionOutcome {
        const entry = this.#files.get(filePath);
        if (!entry || entry.state !== 'converting') return 'dropped';

        if (current === null) {
            this.#files.delete(filePath);
            return 'dropped';
        }

        if (!completion.raced && !completion.retryable) {
            entry.lastAttemptFingerprint = { ...completion.fingerprint };
        }
        if (completion.digest) {
            entry.lastDigest = completion.digest;
        }

        // mtime granularity can hide a rewrite, so any event during the job counts as a change.
        const changed = completion.raced || entry.touchedDuringJob;

        if (current === undefined) {
            if (changed) {
                this.#restart(entry, { ...completion.fingerprint, readable: entry.readable }, now);
                return 'reobserve';
            }
            this.#settle(entry, now);
            return 'unverified';
        }

        if (changed || !sameFingerprint(current, completion.fingerprint)) {
            this.#restart(entry, current, now);
            return 'reobserve';
        }

        this.#settle(entry, now);
        return 'idle';
    }

    get(filePath: string): Readonly<CandidateFile> | undefined {
        return this.#files.get(filePath);
    }

    stateOf(filePath: string): GateState | 'unseen' {
        return this.#files.get(filePath)?.state ?? 'unseen';
    }

    /** Number of tracked paths, optionally restricted to one state. */
    count(state?: GateState): number {
        if (!state) return this.#files.size;
        let total = 0;
        for (const entry of this.#files.values()) {
            if (entry.state === state) total += 1;
        }
        return total;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #advance(entry: CandidateFile, observation: FileObservation, now: number): GateDecision {
        const elapsed = now - entry.observedAt;
        const unchanged = sameFingerprint(entry, observation);

        entry.observedAt = now;
        entry.readable = observation.readable;

        if (!unchanged) {
            entry.state = 'observing';
            entry.size = observation.size;
            entry.mtimeMs = observation.mtimeMs;
            entry.unchangedCount = 0;
            return this.#waiting(entry);
        }

        entry.unchangedCount += 1;
        if (elapsed >= this.#quietPeriodMs && observation.size > 0 && observation.readable) {
            entry.state = 'stable';
            return { outcome: 'stable' };
        }

        entry.state = 'observing';
        return this.#waiting(entry);
    }

    #restart(entry: CandidateFile, observation: FileObservation, now: number): void {
        entry.state = 'observing';
        entry.size = observation.size;
        entry.mtimeMs = observation.mtimeMs;
        entry.readable = observation.readable;
        entry.observedAt = now;
        entry.unchangedCount = 0;
        entry.idleSince = undefined;
        entry.touchedDuringJob = false;
    }

    #settle(entry: CandidateFile, now: number): void {
        entry.state = 'idle';
        entry.idleSince = now;
        this.#evictIdle();
    }

    #waiting(entry: CandidateFile): GateDecision {
        // Empty files are not polled; the next write produces a new event.
        if (entry.size === 0) {
            return { outcome: 'observing' };
        }
        return { outcome: 'observing', recheckInMs: this.#quietPeriodMs };
    }

    #evictIdle(): void {
        const idle = [...this.#files.values()].filter((entry) => entry.state === 'idle');
        if (idle.length <= this.#maxIdleEntries) return;

        idle.sort((a, b) => (a.idleSince ?? 0) - (b.idleSince ?? 0));
        for (const entry of idle.slice(0, idle.length - this.#maxIdleEntries)) {
            this.#files.delete(entry.path);
        }
    }
}
