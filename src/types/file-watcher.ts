/** Kinds of filesystem change an event source emits. */
export type FileEventKind = 'created' | 'modified' | 'deleted';

/** Normalized filesystem event payload. */
export interface FileEvent {
    kind: FileEventKind;
    /** Absolute path of the affected file. */
    path: string;
    /** Id of the watch target the file belongs to. */
    targetId: string;
    /** ISO-8601 timestamp when the event was detected. */
    timestamp: string;
}

/** Callback that receives events from a running source. */
export type FileEventSink = (event: FileEvent) => void;

/** A directory being watched. Immutable once the dispatcher starts. */
export interface WatchTarget {
    /** Unique label for this watch (defaults to the directory path). */
    id: string;
    /** Absolute path to the directory to monitor. */
    directory: string;
    /** Descend into subdirectories. */
    recursive: boolean;
}

export type EventSourceKind = 'notifier' | 'polling';

/**
 * Anything that can tell the dispatcher "a file under a watch root changed".
 *
 * A source is started once, pushes events into the sink until `stop()` is
 * called, and cannot be restarted afterwards.
 */
export interface EventSource {
    readonly kind: EventSourceKind;
    start(sink: FileEventSink): Promise<void>;
    stop(): Promise<void>;
}

/** Size and modification time of a file at one point in time. */
export interface Fingerprint {
    size: number;
    mtimeMs: number;
}
