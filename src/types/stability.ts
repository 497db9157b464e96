import type { Fingerprint } from './file-watcher.js';

/** Lifecycle of a tracked path. Untracked paths are implicitly `unseen`. */
export type GateState = 'observing' | 'stable' | 'converting' | 'idle';

/** One stat of a candidate file, as taken by the dispatcher. */
export interface FileObservation extends Fingerprint {
    /** Whether the file could be opened for reading when it was observed. */
    readable: boolean;
}

/** Per-path bookkeeping owned by the stability gate. */
export interface CandidateFile {
    path: string;
    state: GateState;
    size: number;
    mtimeMs: number;
    readable: boolean;
    /** Epoch ms when the path was first tracked. */
    firstSeenAt: number;
    /** Epoch ms of the latest observation. */
    observedAt: number;
    /** Consecutive observations with the same fingerprint. */
    unchangedCount: number;
    /** Fingerprint of the last conversion attempt, whatever its outcome. */
    lastAttemptFingerprint?: Fingerprint;
    /** SHA-256 of the source bytes of the last successful conversion. */
    lastDigest?: string;
    /** Epoch ms when the path last entered `idle`. */
    idleSince?: number;
    /** An event arrived while the path was converting. */
    touchedDuringJob?: boolean;
}

/**
 * What the gate decided about an observation.
 *
 * - `ignored`    the path fails the name filter
 * - `discarded`  the file is gone and tracking was dropped
 * - `observing`  still waiting for the file to settle
 * - `stable`     ready to be claimed for conversion
 * - `deferred`   a job is running; re-check after it completes
 * - `unchanged`  idle and identical to the last attempt
 */
export type GateOutcome = 'ignored' | 'discarded' | 'observing' | 'stable' | 'deferred' | 'unchanged';

export interface GateDecision {
    outcome: GateOutcome;
    /** When set, the caller should observe the path again after this many ms. */
    recheckInMs?: number;
}

/** How a conversion job ended, from the gate's point of view. */
export interface JobCompletion {
    /** Fingerprint the job was created for. */
    fingerprint: Fingerprint;
    /** Digest of the converted bytes when the job produced (or matched) output. */
    digest?: string;
    /** The job lost a race with the writer and must re-stabilize. */
    raced: boolean;
    /** The failure was on the output side; the next event for this fingerprint retries. */
    retryable?: boolean;
}

/**
 * Result of {@link StabilityGate.complete}. `unverified` means the path is
 * idle but the post-job stat failed, so the caller should re-check it.
 */
export type CompletionOutcome = 'idle' | 'reobserve' | 'unverified' | 'dropped';

export interface StabilityGateOptions {
    /** Minimum quiet time between two identical observations. @default 1250 */
    quietPeriodMs?: number;
    /** Upper bound on retained idle entries; oldest are evicted first. @default 10000 */
    maxIdleEntries?: number;
}
