import { scanTarget, type ScannedFile } from './directory-scan.js';
import { sameFingerprint } from './stability-gate.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import type { EventSource, FileEvent, FileEventKind, FileEventSink, WatchTarget } from '../types/file-watcher.js';

export interface PollingSourceOptions {
    /** Delay between the end of one scan and the start of the next. @default 2000 */
    intervalMs?: number;
    logger?: Logger;
}

const DEFAULT_INTERVAL_MS = 2000;

type Snapshot = Map<string, ScannedFile>;

/**
 * Event source that rescans every watch root on a timer and diffs the
 * `{size, mtime}` of each candidate file against the previous scan.
 *
 * The first scan runs inside `start()` and only records a baseline, so files
 * that already exist are not reported as `created`. Scans never overlap.
 */
export class PollingSource implements EventSource {
    readonly kind = 'polling' as const;
    readonly #targets: readonly WatchTarget[];
    readonly #intervalMs: number;
    readonly #log: Logger;
    #snapshot: Snapshot = new Map();
    #sink: FileEventSink | null = null;
    #timer: NodeJS.Timeout | null = null;
    #scanning: Promise<void> | null = null;
    #started = false;
    #stopped = false;

    constructor(targets: readonly WatchTarget[], options: PollingSourceOptions = {}) {
        this.#targets = targets;
        this.#intervalMs = Math.max(1, Math.floor(options.intervalMs ?? DEFAULT_INTERVAL_MS));
        this.#log = options.logger ?? componentLogger('polling');
    }

    get intervalMs(): number {
        return this.#intervalMs;
    }

    async start(sink: FileEventSink): Promise<void> {
        if (this.#started) {
            throw new Error('[PollingSource] A polling source cannot be started twice.');
        }
        this.#started = true;

        const baseline: Snapshot = new Map();
        for (const target of this.#targets) {
            for (const file of await scanTarget(target, this.#log)) {
                baseline.set(file.path, file);
            }
        }
        this.#snapshot = baseline;
        this.#sink = sink;
        this.#schedule();

        this.#log.info(
            { intervalMs: this.#intervalMs, targets: this.#targets.map((t) => t.directory) },
            'polling: watching',
        );
    }

    async stop(): Promise<void> {
        this.#stopped = true;
        if (this.#timer) {
            clearTimeout(this.#timer);
            this.#timer = null;
        }
        await this.#scanning;
        this.#sink = null;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #schedule(): void {
        if (this.#stopped) return;
        this.#timer = setTimeout(() => {
            this.#timer = null;
            const scan = this.#tick();
            this.#scanning = scan;
            void scan.then(() => {
                this.#scanning = null;
                this.#schedule();
            });
        }, this.#intervalMs);
    }

    /** One scan + diff. Never rejects. */
    async #tick(): Promise<void> {
        const next: Snapshot = new Map();

        for (const target of this.#targets) {
            let files: ScannedFile[];
            try {
                files = await scanTarget(target, this.#log);
            } catch (err) {
                // Keep the previous view of an unreadable root rather than reporting every file deleted.
                this.#log.warn({ err, path: target.directory }, 'polling: watch root cannot be scanned');
                for (const previous of this.#snapshot.values()) {
                    if (previous.targetId === target.id) next.set(previous.path, previous);
                }
                continue;
            }
            for (const file of files) {
                next.set(file.path, file);
            }
        }

        if (this.#stopped) return;

        const events: FileEvent[] = [];
        for (const [filePath, file] of next) {
            const previous = this.#snapshot.get(filePath);
            if (!previous) {
                events.push(this.#event('created', file));
            } else if (!sameFingerprint(previous, file)) {
                events.push(this.#event('modified', file));
            }
        }
        for (const [filePath, previous] of this.#snapshot) {
            if (!next.has(filePath)) {
                events.push(this.#event('deleted', previous));
            }
        }

        this.#snapshot = next;
        for (const event of events) {
            this.#sink?.(event);
        }
    }

    #event(kind: FileEventKind, file: ScannedFile): FileEvent {
        return { kind, path: file.path, targetId: file.targetId, timestamp: new Date().toISOString() };
    }
}
