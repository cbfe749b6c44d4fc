/**
 * FormatSelector - Chooses the representation to download for a link
 *
 * Tiers, in order:
 *   1. a combined audio+video stream, when no video-only stream ranks higher
 *   2. the best video-only stream merged with the best audio-only stream
 *   3. the best combined stream when no audio-only stream exists
 * Unreliable transports and DRM streams never qualify.
 */

import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import {
    AudioOnlyCandidate,
    CombinedCandidate,
    FormatCandidate,
    FormatSelection,
    LinkEntry,
    ClientProfile,
    SelectionFailure,
    SelectionResult,
    VideoOnlyCandidate,
} from '../../types';
import { RetrievalEngine, isTransientError } from '../core/types';

export interface FormatSelectorOptions {
    unreliableProtocols: string[];
    retryAttempts: number;
    retryDelayMs: number;
}

/**
 * Used when the format list could not be read: let the engine pick the
 * best streams itself.
 */
export const GENERIC_SELECTION: FormatSelection = {
    mode: 'generic',
    formatSpec: 'bestvideo*+bestaudio/bestvideo+bestaudio/best',
    label: 'generic-best',
};

export type ChooseResult =
    | { ok: true; selection: FormatSelection }
    | { ok: false; failure: SelectionFailure };

/**
 * Highest resolution first, then higher bitrate, then list order
 */
function pickBest<T extends FormatCandidate>(candidates: T[]): T | undefined {
    let best: T | undefined;
    for (const candidate of candidates) {
        if (
            !best ||
            candidate.resolutionRank > best.resolutionRank ||
            (candidate.resolutionRank === best.resolutionRank && candidate.bitrate > best.bitrate)
        ) {
            best = candidate;
        }
    }
    return best;
}

function qualityLabel(candidate: FormatCandidate): string {
    return candidate.resolutionRank > 0 ? `${candidate.resolutionRank}p` : candidate.formatId;
}

export class FormatSelector {
    private readonly engine: RetrievalEngine;
    private readonly unreliableProtocols: Set<string>;
    private readonly options: FormatSelectorOptions;

    constructor(engine: RetrievalEngine, options: FormatSelectorOptions) {
        this.engine = engine;
        this.options = options;
        this.unreliableProtocols = new Set(options.unreliableProtocols.map((p) => p.toLowerCase()));
    }

    /**
     * Query the engine for the link's representations and choose one
     */
    async select(
        link: LinkEntry,
        profile: ClientProfile,
        excludedFormatIds: string[] = [],
        signal?: AbortSignal,
    ): Promise<SelectionResult> {
        const url = link.url ?? link.canonicalId;
        const info = await retryWithBackoff(
            () => this.engine.inspect(url, profile.cookieJar, {
                playerClients: profile.playerClients,
                signal,
            }),
            this.options.retryAttempts,
            this.options.retryDelayMs,
            `list formats ${link.canonicalId}`,
            { shouldRetry: isTransientError, backoff: 'linear', signal },
        );

        const chosen = this.choose(info.formats, excludedFormatIds);
        if (!chosen.ok) {
            logger.warn('No acceptable format', {
                link: link.canonicalId,
                reason: chosen.failure.reason,
                available: info.formats.length,
            });
            return chosen;
        }

        logger.info('Format selected', {
            link: link.canonicalId,
            format: chosen.selection.formatSpec,
            label: chosen.selection.label,
        });
        return { ok: true, selection: chosen.selection, title: info.title };
    }

    /**
     * Apply the tiered policy to a candidate list
     */
    choose(candidates: FormatCandidate[], excludedFormatIds: string[] = []): ChooseResult {
        if (candidates.length === 0) {
            return {
                ok: false,
                failure: { reason: 'no-formats', message: 'No formats were reported for this video' },
            };
        }

        const excluded = new Set(excludedFormatIds);
        const eligible = candidates.filter((c) => this.isEligible(c, excluded));

        const combined: CombinedCandidate[] = [];
        const videoOnly: VideoOnlyCandidate[] = [];
        const audioOnly: AudioOnlyCandidate[] = [];
        for (const candidate of eligible) {
            switch (candidate.kind) {
                case 'combined':
                    combined.push(candidate);
                    break;
                case 'video-only':
                    videoOnly.push(candidate);
                    break;
                case 'audio-only':
                    audioOnly.push(candidate);
                    break;
            }
        }

        const bestCombined = pickBest(combined);
        const bestVideo = pickBest(videoOnly);
        const bestAudio = pickBest(audioOnly);

        if (bestCombined && (!bestVideo || bestCombined.resolutionRank >= bestVideo.resolutionRank)) {
            return { ok: true, selection: this.combinedSelection(bestCombined) };
        }

        if (bestVideo && bestAudio) {
            return {
                ok: true,
                selection: {
                    mode: 'merge',
                    video: bestVideo,
                    audio: bestAudio,
                    formatSpec: `${bestVideo.formatId}+${bestAudio.formatId}`,
                    label: `merge ${qualityLabel(bestVideo)}`,
                },
            };
        }

        if (bestCombined) {
            return { ok: true, selection: this.combinedSelection(bestCombined) };
        }

        return {
            ok: false,
            failure: {
                reason: 'no-acceptable-format',
                message: `None of the ${candidates.length} reported formats is usable`,
            },
        };
    }

    private combinedSelection(candidate: CombinedCandidate): FormatSelection {
        return {
            mode: 'combined',
            video: candidate,
            formatSpec: candidate.formatId,
            label: `combined ${qualityLabel(candidate)}`,
        };
    }

    private isEligible(candidate: FormatCandidate, excluded: Set<string>): boolean {
        if (excluded.has(candidate.formatId)) return false;
        if (candidate.hasDrm) return false;
        return !this.unreliableProtocols.has(candidate.protocol.toLowerCase());
    }
}

/**
 * Format ids a selection depends on
 */
export function selectionFormatIds(selection: FormatSelection): string[] {
    switch (selection.mode) {
        case 'merge':
            return [selection.video.formatId, selection.audio.formatId];
        case 'combined':
            return [selection.video.formatId];
        case 'generic':
            return [];
    }
}
