/**
 * DownloadExecutor - Runs one job against the retrieval engine
 *
 * transient failures      -> retried with linear backoff
 * format-unavailable      -> one re-selection without the failing format
 * access denied, formats
 * gone, retries exhausted -> next download strategy, selecting again
 * everything else         -> reported immediately
 * execute() never throws; every outcome is a value.
 */

import fs from 'fs/promises';
import { logger, summarizeError } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import { NO_CREDENTIALS } from '../../utils/CookieResolver';
import {
    CookieJar,
    DownloadJob,
    DownloadOutcome,
    DownloadStrategy,
    LinkEntry,
    ClientProfile,
    SelectionResult,
} from '../../types';
import { FormatSelector, GENERIC_SELECTION, selectionFormatIds } from '../quality/FormatSelector';
import {
    DownloadProgress,
    RetrievalEngine,
    RetrievalError,
    RetrievalFailureKind,
    RetrievalResult,
    isRetrievalError,
    isTransientError,
} from './types';

export interface DownloadExecutorOptions {
    retryAttempts: number;
    retryDelayMs: number;
    strategies: DownloadStrategy[];
    minOutputBytes: number;
}

// Failures another client or cookie setting may get past
const NEXT_STRATEGY_REASONS = new Set([
    'access-denied',
    'format-unavailable',
    'transient',
    'no-formats',
    'no-acceptable-format',
]);

// Format list failures that still leave a download worth trying
const GENERIC_FALLBACK_KINDS = new Set<RetrievalFailureKind>([
    'access-denied',
    'format-unavailable',
    'transient-network',
    'fragment-unavailable',
]);

export class DownloadExecutor {
    private readonly engine: RetrievalEngine;
    private readonly selector: FormatSelector;
    private readonly options: DownloadExecutorOptions;

    constructor(engine: RetrievalEngine, selector: FormatSelector, options: DownloadExecutorOptions) {
        if (options.strategies.length === 0) {
            throw new Error('At least one download strategy is required');
        }
        this.engine = engine;
        this.selector = selector;
        this.options = options;
    }

    /**
     * Select a format with the first strategy, as a job's initial selection
     */
    select(link: LinkEntry, cookieJar: CookieJar, signal?: AbortSignal): Promise<SelectionResult> {
        return this.selectWith(link, cookieJar, 0, [], signal);
    }

    async execute(
        job: DownloadJob,
        signal?: AbortSignal,
        onProgress?: (progress: DownloadProgress) => void,
    ): Promise<DownloadOutcome> {
        const { strategies } = this.options;
        let outcome = await this.executeStrategy(job, signal, onProgress);

        while (
            outcome.status === 'failed' &&
            NEXT_STRATEGY_REASONS.has(outcome.reason) &&
            job.strategyIndex < strategies.length - 1 &&
            !signal?.aborted
        ) {
            const previous = this.strategyAt(job.strategyIndex).name;
            job.strategyIndex++;
            logger.warn('Switching download strategy', {
                jobId: job.id,
                from: previous,
                to: this.strategyAt(job.strategyIndex).name,
                reason: outcome.reason,
            });

            job.excludedFormatIds = [];
            let selected: SelectionResult;
            try {
                selected = await this.selectWith(job.link, job.cookieJar, job.strategyIndex, [], signal);
            } catch (error) {
                outcome = this.failure(job, error);
                continue;
            }
            if (!selected.ok) {
                outcome = this.selectionFailure(job, selected.failure.reason, selected.failure.message);
                continue;
            }

            job.selection = selected.selection;
            outcome = await this.executeStrategy(job, signal, onProgress);
        }

        return outcome;
    }

    /**
     * Download with the job's current strategy, re-selecting once when a format disappears
     */
    private async executeStrategy(
        job: DownloadJob,
        signal?: AbortSignal,
        onProgress?: (progress: DownloadProgress) => void,
    ): Promise<DownloadOutcome> {
        let reselected = false;
        const strategy = this.strategyAt(job.strategyIndex);

        for (;;) {
            try {
                const result = await this.attemptWithRetries(job, strategy, signal, onProgress);
                logger.info('Download completed', {
                    jobId: job.id,
                    outputPath: result.outputPath,
                    attempts: job.attemptCount,
                    strategy: strategy.name,
                });
                return {
                    status: 'success',
                    outputPath: result.outputPath,
                    filesize: result.filesize,
                    warnings: result.warnings,
                    attempts: job.attemptCount,
                    formatLabel: job.selection.label,
                    strategy: strategy.name,
                };
            } catch (error) {
                if (isRetrievalError(error) && error.kind === 'format-unavailable' && !reselected && !signal?.aborted) {
                    reselected = true;
                    // Without a named id, blame the video stream only
                    const failed = error.formatIds.length > 0
                        ? error.formatIds
                        : selectionFormatIds(job.selection).slice(0, 1);
                    job.excludedFormatIds.push(...failed.filter((id) => !job.excludedFormatIds.includes(id)));
                    logger.warn('Format became unavailable, selecting again', {
                        jobId: job.id,
                        excluded: job.excludedFormatIds,
                    });

                    const reselection = await this.reselect(job, signal);
                    if (reselection) return reselection;
                    continue;
                }

                return this.failure(job, error);
            }
        }
    }

    /**
     * Re-run format selection; returns a failed outcome when nothing is left
     */
    private async reselect(job: DownloadJob, signal?: AbortSignal): Promise<DownloadOutcome | undefined> {
        try {
            const result = await this.selectWith(
                job.link,
                job.cookieJar,
                job.strategyIndex,
                job.excludedFormatIds,
                signal,
            );
            if (!result.ok) {
                return this.selectionFailure(job, result.failure.reason, result.failure.message);
            }
            job.selection = result.selection;
            return undefined;
        } catch (error) {
            return this.failure(job, error);
        }
    }

    /**
     * Select under a strategy; an unreadable format list falls back to the generic selection
     */
    private async selectWith(
        link: LinkEntry,
        cookieJar: CookieJar,
        strategyIndex: number,
        excludedFormatIds: string[],
        signal?: AbortSignal,
    ): Promise<SelectionResult> {
        const strategy = this.strategyAt(strategyIndex);
        try {
            return await this.selector.select(link, this.profileFor(strategy, cookieJar), excludedFormatIds, signal);
        } catch (error) {
            if (signal?.aborted || !isRetrievalError(error) || !GENERIC_FALLBACK_KINDS.has(error.kind)) {
                throw error;
            }
            logger.warn('Format list unavailable, letting the engine choose', {
                link: link.canonicalId,
                strategy: strategy.name,
                error: summarizeError(error),
            });
            return { ok: true, selection: GENERIC_SELECTION, title: link.canonicalId };
        }
    }

    private attemptWithRetries(
        job: DownloadJob,
        strategy: DownloadStrategy,
        signal?: AbortSignal,
        onProgress?: (progress: DownloadProgress) => void,
    ): Promise<RetrievalResult> {
        const profile = this.profileFor(strategy, job.cookieJar);
        return retryWithBackoff(
            async () => {
                if (signal?.aborted) {
                    throw new RetrievalError('cancelled', 'Download cancelled');
                }
                job.attemptCount++;
                const result = await this.engine.retrieve({
                    jobId: job.id,
                    url: job.link.url ?? job.link.canonicalId,
                    formatSpec: job.selection.formatSpec,
                    formatIds: selectionFormatIds(job.selection),
                    cookieJar: profile.cookieJar,
                    destinationPath: job.destinationPath,
                    playerClients: profile.playerClients,
                    signal,
                    onProgress,
                });
                await this.verifyOutput(result);
                return result;
            },
            this.options.retryAttempts,
            this.options.retryDelayMs,
            `download ${job.link.canonicalId} (${strategy.name})`,
            { shouldRetry: isTransientError, backoff: 'linear', signal },
        );
    }

    /**
     * Undersized files are truncated merges: delete and retry
     */
    private async verifyOutput(result: RetrievalResult): Promise<void> {
        if (result.filesize >= this.options.minOutputBytes) return;

        await fs.rm(result.outputPath, { force: true });
        throw new RetrievalError(
            'fragment-unavailable',
            `Downloaded file was too small (${result.filesize} bytes)`,
        );
    }

    private profileFor(strategy: DownloadStrategy, cookieJar: CookieJar): ClientProfile {
        return {
            cookieJar: strategy.useCookies ? cookieJar : NO_CREDENTIALS,
            playerClients: strategy.playerClients,
        };
    }

    private strategyAt(index: number): DownloadStrategy {
        const { strategies } = this.options;
        return strategies[Math.min(index, strategies.length - 1)];
    }

    private selectionFailure(job: DownloadJob, reason: string, detail: string): DownloadOutcome {
        return { status: 'failed', reason, detail, attempts: job.attemptCount };
    }

    private failure(job: DownloadJob, error: unknown): DownloadOutcome {
        const detail = summarizeError(error);
        let reason: string;

        if (!isRetrievalError(error)) {
            reason = 'error';
        } else if (isTransientError(error)) {
            reason = 'transient';
        } else {
            reason = error.kind;
        }

        logger.warn('Download failed', {
            jobId: job.id,
            reason,
            detail,
            attempts: job.attemptCount,
            strategy: this.strategyAt(job.strategyIndex).name,
        });

        return { status: 'failed', reason, detail, attempts: job.attemptCount };
    }
}
