/**
 * Core Types for the Retrieval Seam
 * The media engine is consumed only through these interfaces
 */

import { CookieJar, FormatCandidate } from '../../types/download';

// ============================================================================
// Failures
// ============================================================================

export type RetrievalFailureKind =
    | 'transient-network'
    | 'fragment-unavailable'
    | 'format-unavailable'
    | 'access-denied'
    | 'not-found'
    | 'disk-error'
    | 'cancelled';

export const TRANSIENT_FAILURES: ReadonlySet<RetrievalFailureKind> = new Set([
    'transient-network',
    'fragment-unavailable',
]);

export class RetrievalError extends Error {
    readonly kind: RetrievalFailureKind;
    readonly formatIds: string[];

    constructor(kind: RetrievalFailureKind, message: string, formatIds: string[] = []) {
        super(message);
        this.name = 'RetrievalError';
        this.kind = kind;
        this.formatIds = formatIds;
    }
}

export function isRetrievalError(error: unknown): error is RetrievalError {
    return error instanceof RetrievalError;
}

export function isTransientError(error: unknown): boolean {
    return isRetrievalError(error) && TRANSIENT_FAILURES.has(error.kind);
}

// ============================================================================
// Engine Types
// ============================================================================

export interface MediaInfo {
    title: string;
    duration?: number;
    formats: FormatCandidate[];
}

export interface InspectOptions {
    playerClients: string[];
    signal?: AbortSignal;
}

export interface DownloadProgress {
    jobId: string;
    percentage: number;
    downloadedBytes: number;
    totalBytes: number; // an estimate while the size is reported with ~
    speed: number; // bytes per second
    eta: number; // seconds
}

export interface RetrievalRequest {
    jobId: string;
    url: string;
    formatSpec: string;
    formatIds: string[];
    cookieJar: CookieJar;
    destinationPath: string;
    playerClients: string[];
    signal?: AbortSignal;
    onProgress?: (progress: DownloadProgress) => void;
}

export interface RetrievalResult {
    outputPath: string;
    filesize: number;
    warnings: string[];
}

export interface RetrievalEngine {
    readonly name: string;

    /**
     * List the title and available representations of a link
     */
    inspect(url: string, cookieJar: CookieJar, options: InspectOptions): Promise<MediaInfo>;

    /**
     * Retrieve and merge the requested representation into destinationPath
     */
    retrieve(request: RetrievalRequest): Promise<RetrievalResult>;

    /**
     * Lightweight check that a browser cookie store can be read
     */
    checkBrowserCookies(browser: string): Promise<boolean>;
}

// ============================================================================
// Event Types
// ============================================================================

export type DownloadEventType =
    | 'task:started'
    | 'task:progress'
    | 'task:completed'
    | 'task:failed'
    | 'task:cancelled';

export interface DownloadEvent {
    type: DownloadEventType;
    index: number;
    url: string;
    timestamp: Date;
    data?: Record<string, unknown>;
}

export type DownloadEventHandler = (event: DownloadEvent) => void;

// ============================================================================
// Run Errors
// ============================================================================

export type RunPreconditionCode = 'no-valid-links' | 'output-directory' | 'links-file';

/**
 * Raised before any job is dispatched when the whole run cannot proceed
 */
export class RunPreconditionError extends Error {
    readonly code: RunPreconditionCode;

    constructor(code: RunPreconditionCode, message: string) {
        super(message);
        this.name = 'RunPreconditionError';
        this.code = code;
    }
}
