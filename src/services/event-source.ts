import { NotifierSource } from './notifier-source.js';
import { PollingSource } from './polling-source.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { StartupError, errorMessage } from '../types/errors.js';
import type { EventSource, FileEventSink, WatchTarget } from '../types/file-watcher.js';

export interface EventSourceSelection {
    targets: readonly WatchTarget[];
    pollIntervalMs: number;
    coalesceMs: number;
    /** Skip the notifier and poll from the start. */
    forcePolling: boolean;
    logger?: Logger;
    /** Overrides for the two implementations. */
    createNotifier?: (targets: readonly WatchTarget[]) => EventSource;
    createPolling?: (targets: readonly WatchTarget[]) => EventSource;
}

/**
 * Start the preferred event source: OS notifications first, polling when the
 * notifier cannot be created or fails to start. Falling back is not an
 * error; only a polling failure is, and it surfaces as a `StartupError`.
 */
export async function startEventSource(selection: EventSourceSelection, sink: FileEventSink): Promise<EventSource> {
    const log = selection.logger ?? componentLogger('event-source');
    const createNotifier =
        selection.createNotifier ??
        ((targets) => new NotifierSource(targets, { coalesceMs: selection.coalesceMs }));
    const createPolling =
        selection.createPolling ??
        ((targets) => new PollingSource(targets, { intervalMs: selection.pollIntervalMs }));

    if (!selection.forcePolling) {
        let notifier: EventSource | null = null;
        try {
            notifier = createNotifier(selection.targets);
            await notifier.start(sink);
            return notifier;
        } catch (err) {
            log.info({ reason: errorMessage(err) }, 'event-source: file notifications unavailable; using polling');
            await stopQuietly(notifier, log);
        }
    }

    const polling = createPolling(selection.targets);
    try {
        await polling.start(sink);
    } catch (err) {
        await stopQuietly(polling, log);
        throw new StartupError(`No usable event source: ${errorMessage(err)}`, { cause: err });
    }
    return polling;
}

async function stopQuietly(source: EventSource | null, log: Logger): Promise<void> {
    if (!source) return;
    try {
        await source.stop();
    } catch (err) {
        log.debug({ err, kind: source.kind }, 'event-source: cleanup after failed start also failed');
    }
}
