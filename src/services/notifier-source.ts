import { watch, type FSWatcher } from 'chokidar';
import { isCandidatePath } from './path-filter.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import type { EventSource, FileEventKind, FileEventSink, WatchTarget } from '../types/file-watcher.js';

const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/.git/**'];
const DEFAULT_COALESCE_MS = 100;

const RAW_EVENTS = ['add', 'change', 'unlink'] as const;

type RawEventName = (typeof RAW_EVENTS)[number];

const EVENT_KIND_MAP: Record<RawEventName, FileEventKind> = {
    add: 'created',
    change: 'modified',
    unlink: 'deleted',
};

export interface NotifierSourceOptions {
    /** Window in which repeated `modified` events for one path collapse into one. @default 100 */
    coalesceMs?: number;
    logger?: Logger;
}

/**
 * Event source backed by OS change notifications through `chokidar`.
 *
 * `start()` resolves once every target reports `ready` and rejects if any
 * watcher errors first, which is the signal to fall back to polling.
 *
 * Only `created`, `modified` and `deleted` are emitted, for candidate CSV
 * paths. A burst of `modified` events for one path within `coalesceMs` is
 * delivered once at the end of the window; `created` and `deleted` are
 * delivered immediately and cancel a pending `modified`.
 */
export class NotifierSource implements EventSource {
    readonly kind = 'notifier' as const;
    readonly #targets: readonly WatchTarget[];
    readonly #coalesceMs: number;
    readonly #log: Logger;
    readonly #watchers: Map<string, FSWatcher> = new Map();
    readonly #pendingModified: Map<string, NodeJS.Timeout> = new Map();
    #sink: FileEventSink | null = null;
    #started = false;

    constructor(targets: readonly WatchTarget[], options: NotifierSourceOptions = {}) {
        this.#targets = targets;
        this.#coalesceMs = Math.max(0, Math.floor(options.coalesceMs ?? DEFAULT_COALESCE_MS));
        this.#log = options.logger ?? componentLogger('notifier');
    }

    async start(sink: FileEventSink): Promise<void> {
        if (this.#started) {
            throw new Error('[NotifierSource] A notifier source cannot be started twice.');
        }
        this.#started = true;
        this.#sink = sink;

        try {
            for (const target of this.#targets) {
                await this.#watchTarget(target);
            }
        } catch (err) {
            await this.stop();
            throw err;
        }
    }

    async stop(): Promise<void> {
        this.#sink = null;
        for (const timer of this.#pendingModified.values()) {
            clearTimeout(timer);
        }
        this.#pendingModified.clear();

        const watchers = [...this.#watchers.entries()];
        this.#watchers.clear();
        for (const [targetId, watcher] of watchers) {
            await watcher.close();
            this.#log.debug({ targetId }, 'notifier: stopped watching');
        }
    }

    /** Ids of targets with a live watcher. */
    activeTargets(): string[] {
        return [...this.#watchers.keys()];
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #watchTarget(target: WatchTarget): Promise<void> {
        const watcher = watch(target.directory, {
            ignored: DEFAULT_EXCLUDE,
            persistent: true,
            ignoreInitial: true,
            depth: target.recursive ? undefined : 0,
        });
        this.#watchers.set(target.id, watcher);

        for (const name of RAW_EVENTS) {
            watcher.on(name, (filePath: string) => {
                this.#handleRaw(name, filePath, target.id);
            });
        }

        await new Promise<void>((resolve, reject) => {
            const onError = (err: unknown) => {
                reject(err instanceof Error ? err : new Error(String(err)));
            };
            watcher.once('error', onError);
            watcher.once('ready', () => {
                watcher.off('error', onError);
                resolve();
            });
        });

        // chokidar keeps running after a late error, but events for the directory may stop.
        watcher.on('error', (err: unknown) => {
            this.#log.error(
                { err, targetId: target.id, path: target.directory },
                'notifier: watcher failed; changes in this directory may go unreported',
            );
        });

        this.#log.info({ path: target.directory, recursive: target.recursive }, 'notifier: watching');
    }

    #handleRaw(name: RawEventName, filePath: string, targetId: string): void {
        if (!isCandidatePath(filePath)) return;

        const kind = EVENT_KIND_MAP[name];
        if (kind !== 'modified' || this.#coalesceMs === 0) {
            this.#cancelPending(filePath);
            this.#emit(kind, filePath, targetId);
            return;
        }

        if (this.#pendingModified.has(filePath)) return;

        const timer = setTimeout(() => {
            this.#pendingModified.delete(filePath);
            this.#emit('modified', filePath, targetId);
        }, this.#coalesceMs);
        this.#pendingModified.set(filePath, timer);
    }

    #cancelPending(filePath: string): void {
        const timer = this.#pendingModified.get(filePath);
        if (timer) {
            clearTimeout(timer);
            this.#pendingModified.delete(filePath);
        }
    }

    #emit(kind: FileEventKind, filePath: string, targetId: string): void {
        this.#sink?.({ kind, path: filePath, targetId, timestamp: new Date().toISOString() });
    }
}
