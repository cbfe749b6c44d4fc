/**
 * QueueOrchestrator - Main coordinator for a download run
 * Validates preconditions, resolves cookies once, then runs every valid
 * link through select -> name -> execute on a bounded worker pool.
 * Per-item failures become report entries; only run-wide preconditions throw.
 */

import { EventEmitter } from 'events';
import { logError, logger, summarizeError } from '../../utils/logger';
import { WorkerPool } from '../../queue/WorkerPool';
import { CookieJar, DownloadJob, LinkEntry, RunReport, RunReportEntry } from '../../types';
import { RunContext } from './RunContext';
import {
    DownloadEvent,
    DownloadEventHandler,
    DownloadProgress,
    RunPreconditionError,
    isRetrievalError,
    isTransientError,
} from './types';

interface QueueItem {
    id: string;
    index: number;
    link: LinkEntry;
}

export interface RunOptions {
    signal?: AbortSignal;
}

export class QueueOrchestrator extends EventEmitter {
    private readonly context: RunContext;
    private eventHandlers: DownloadEventHandler[] = [];

    constructor(context: RunContext) {
        super();
        this.context = context;
    }

    /**
     * Add event handler
     */
    onDownloadEvent(handler: DownloadEventHandler): void {
        this.eventHandlers.push(handler);
    }

    async run(entries: LinkEntry[], options: RunOptions = {}): Promise<RunReport> {
        const { signal } = options;
        const startedAt = new Date();
        const valid = entries.filter((entry) => entry.isValid);

        if (valid.length === 0) {
            throw new RunPreconditionError('no-valid-links', 'No valid video links were found');
        }

        const { outputNamer, cookieResolver, config } = this.context;
        try {
            await outputNamer.prepare();
        } catch (error) {
            throw new RunPreconditionError(
                'output-directory',
                `Cannot create output directory ${outputNamer.getOutputDirectory()}: ${summarizeError(error)}`,
            );
        }

        const cookieJar = await cookieResolver.resolve();
        logger.info('🚀 Run started', {
            links: valid.length,
            skipped: entries.length - valid.length,
            cookies: cookieJar.description,
            concurrency: config.maxConcurrentDownloads,
        });

        const slots: Array<RunReportEntry | undefined> = valid.map(() => undefined);
        let finalized = false;
        const record = (entry: RunReportEntry): void => {
            if (finalized || slots[entry.index]) return;
            slots[entry.index] = entry;
        };

        const pool = new WorkerPool<QueueItem>(config.maxConcurrentDownloads);
        pool.setProcessingCallback(async (item) => {
            record(await this.processItem(item, cookieJar, signal));
        });

        const onAbort = (): void => {
            for (const item of pool.stop()) {
                record(this.cancelledEntry(item));
            }
        };

        if (signal?.aborted) {
            onAbort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
            valid.forEach((link, index) => {
                pool.add({ id: `${index}:${link.canonicalId}`, index, link });
            });
        }

        await this.waitForCompletion(pool, signal);
        signal?.removeEventListener('abort', onAbort);

        // In-flight items that outlived the grace period
        valid.forEach((link, index) => {
            if (!slots[index]) {
                record(this.cancelledEntry({ id: `${index}:${link.canonicalId}`, index, link }));
            }
        });
        finalized = true;

        const report: RunReport = {
            entries: slots.filter((entry): entry is RunReportEntry => entry !== undefined),
            cookieSource: cookieJar.description,
            startedAt,
            finishedAt: new Date(),
            cancelled: signal?.aborted ?? false,
        };

        logger.info('🏁 Run finished', {
            succeeded: report.entries.filter((e) => e.outcome === 'success').length,
            failed: report.entries.filter((e) => e.outcome === 'failed').length,
            cancelled: report.cancelled,
        });
        return report;
    }

    /**
     * Item boundary: nothing thrown here escapes to other items
     */
    private async processItem(
        item: QueueItem,
        cookieJar: CookieJar,
        signal?: AbortSignal,
    ): Promise<RunReportEntry> {
        const { outputNamer, executor } = this.context;
        this.emitEvent('task:started', item);

        try {
            if (signal?.aborted) {
                return this.cancelledEntry(item);
            }

            const selection = await executor.select(item.link, cookieJar, signal);
            if (!selection.ok) {
                return this.failedEntry(item, selection.failure.reason, selection.failure.message, 0);
            }

            const job: DownloadJob = {
                id: item.id,
                index: item.index,
                link: item.link,
                title: selection.title,
                selection: selection.selection,
                excludedFormatIds: [],
                cookieJar,
                destinationPath: outputNamer.nameFor(item.link, { title: selection.title }),
                attemptCount: 0,
                strategyIndex: 0,
            };

            const outcome = await executor.execute(job, signal, (progress: DownloadProgress) => {
                this.emitEvent('task:progress', item, {
                    percentage: progress.percentage,
                    speed: progress.speed,
                    eta: progress.eta,
                });
            });

            if (outcome.status === 'failed') {
                if (outcome.reason === 'cancelled') {
                    return this.cancelledEntry(item, outcome.attempts);
                }
                return this.failedEntry(item, outcome.reason, outcome.detail, outcome.attempts, job.title);
            }

            const entry: RunReportEntry = {
                index: item.index,
                link: item.link,
                outcome: 'success',
                title: job.title,
                outputPath: outcome.outputPath,
                filesize: outcome.filesize,
                formatLabel: outcome.formatLabel,
                strategy: outcome.strategy,
                attempts: outcome.attempts,
                warnings: outcome.warnings,
            };
            this.emitEvent('task:completed', item, { outputPath: outcome.outputPath });
            return entry;
        } catch (error) {
            let reason = 'error';
            if (isRetrievalError(error)) {
                reason = isTransientError(error) ? 'transient' : error.kind;
            } else {
                logError(error instanceof Error ? error : new Error(String(error)), {
                    link: item.link.canonicalId,
                });
            }
            if (reason === 'cancelled') {
                return this.cancelledEntry(item);
            }
            return this.failedEntry(item, reason, summarizeError(error), 0);
        }
    }

    private failedEntry(
        item: QueueItem,
        reason: string,
        detail: string,
        attempts: number,
        title?: string,
    ): RunReportEntry {
        this.emitEvent('task:failed', item, { reason, detail });
        return {
            index: item.index,
            link: item.link,
            outcome: 'failed',
            reason,
            detail,
            title,
            attempts,
            warnings: [],
        };
    }

    private cancelledEntry(item: QueueItem, attempts: number = 0): RunReportEntry {
        this.emitEvent('task:cancelled', item);
        return {
            index: item.index,
            link: item.link,
            outcome: 'failed',
            reason: 'cancelled',
            detail: 'Run cancelled before this item finished',
            attempts,
            warnings: [],
        };
    }

    /**
     * Wait for the pool to drain; after an abort, wait at most the grace period
     */
    private waitForCompletion(pool: WorkerPool<QueueItem>, signal?: AbortSignal): Promise<void> {
        const idle = pool.onIdle();
        if (!signal) return idle;

        const graceMs = this.context.config.cancelGraceMs;
        return new Promise((resolve) => {
            let graceTimer: NodeJS.Timeout | undefined;
            const startGrace = (): void => {
                logger.warn('⏳ Cancellation requested, waiting for active downloads', { graceMs });
                graceTimer = setTimeout(resolve, graceMs);
            };

            if (signal.aborted) {
                startGrace();
            } else {
                signal.addEventListener('abort', startGrace, { once: true });
            }

            void idle.then(() => {
                if (graceTimer) clearTimeout(graceTimer);
                signal.removeEventListener('abort', startGrace);
                resolve();
            });
        });
    }

    private emitEvent(type: DownloadEvent['type'], item: QueueItem, data?: Record<string, unknown>): void {
        const event: DownloadEvent = {
            type,
            index: item.index,
            url: item.link.url ?? item.link.canonicalId,
            timestamp: new Date(),
            data,
        };

        this.emit(type, event);
        this.eventHandlers.forEach((handler) => handler(event));
    }
}
