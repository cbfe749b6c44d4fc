/**
 * YtDlpProvider - Retrieval engine backed by the yt-dlp executable
 * Reads formats with --dump-json and downloads/merges with -f <spec>
 */

import { spawn, ChildProcess } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger, summarizeError } from '../../utils/logger';
import { CookieJar, FormatCandidate } from '../../types';
import {
    MediaInfo,
    InspectOptions,
    RetrievalEngine,
    RetrievalError,
    RetrievalFailureKind,
    RetrievalRequest,
    RetrievalResult,
} from '../core/types';

// URL validation schema
const UrlSchema = z
    .string()
    .url()
    .refine(
        (url) => !url.includes(';') && !url.includes('|') && !url.includes('&&'),
        { message: 'Invalid URL format' },
    );

const YtDlpFormatSchema = z.object({
    format_id: z.string().nullish(),
    ext: z.string().nullish(),
    height: z.number().nullish(),
    vcodec: z.string().nullish(),
    acodec: z.string().nullish(),
    tbr: z.number().nullish(),
    vbr: z.number().nullish(),
    abr: z.number().nullish(),
    protocol: z.string().nullish(),
    has_drm: z.union([z.boolean(), z.string()]).nullish(),
});

const YtDlpVideoInfoSchema = z.object({
    id: z.string().nullish(),
    title: z.string().nullish(),
    duration: z.number().nullish(),
    formats: z.array(z.unknown()).nullish(),
});

type YtDlpFormat = z.infer<typeof YtDlpFormatSchema>;

interface ClassificationRule {
    kind: RetrievalFailureKind;
    pattern: RegExp;
}

// First match wins
const ERROR_RULES: ClassificationRule[] = [
    { kind: 'disk-error', pattern: /no space left on device|enospc|errno 28|read-only file system|permission denied|eacces/i },
    { kind: 'fragment-unavailable', pattern: /fragment|did not get any data blocks|unable to download video data/i },
    { kind: 'format-unavailable', pattern: /requested format (is )?not available|format is not available|no video formats found/i },
    { kind: 'access-denied', pattern: /private video|sign in to confirm|members[- ]only|http error 403|join this channel|age[- ]restricted|inappropriate for some users/i },
    { kind: 'not-found', pattern: /video unavailable|has been removed|does not exist|http error 404|incomplete youtube id|not a valid url/i },
    { kind: 'transient-network', pattern: /timed out|timeout|connection reset|econnreset|temporary failure in name resolution|network is unreachable|unable to download webpage|http error 5\d\d|incompleteread|remote end closed/i },
];

/**
 * Map yt-dlp error output to a failure kind; undefined when unrecognized
 */
export function classifyYtDlpError(output: string): RetrievalFailureKind | undefined {
    return ERROR_RULES.find((rule) => rule.pattern.test(output))?.kind;
}

/**
 * Most relevant line of yt-dlp stderr: the last ERROR line, else the last line
 */
export function extractErrorMessage(output: string): string {
    const lines = output
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    const errors = lines.filter((line) => line.startsWith('ERROR:'));
    const line = errors.length > 0 ? errors[errors.length - 1] : lines[lines.length - 1];
    return line ? line.replace(/^ERROR:\s*/, '') : 'yt-dlp failed without output';
}

export function extractWarnings(output: string): string[] {
    return output
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.startsWith('WARNING:'))
        .map((line) => line.replace(/^WARNING:\s*/, ''));
}

/**
 * Convert one yt-dlp format dictionary; null for entries without a usable stream
 */
export function toFormatCandidate(format: YtDlpFormat): FormatCandidate | null {
    if (!format.format_id) return null;

    const hasVideo = !!format.vcodec && format.vcodec !== 'none';
    const hasAudio = !!format.acodec && format.acodec !== 'none';
    const base = {
        formatId: format.format_id,
        container: format.ext || 'unknown',
        bitrate: Math.round(format.tbr || format.vbr || format.abr || 0),
        protocol: format.protocol || 'https',
        hasDrm: format.has_drm === true,
    };

    if (hasVideo && hasAudio) {
        return { ...base, kind: 'combined', hasVideo: true, hasAudio: true, resolutionRank: format.height || 0 };
    }
    if (hasVideo) {
        return { ...base, kind: 'video-only', hasVideo: true, hasAudio: false, resolutionRank: format.height || 0 };
    }
    if (hasAudio) {
        return { ...base, kind: 'audio-only', hasVideo: false, hasAudio: true, resolutionRank: 0 };
    }
    return null;
}

/**
 * Parse --dump-json output into media info
 */
export function parseMetadataOutput(output: string): MediaInfo {
    let raw: unknown;
    try {
        raw = JSON.parse(output);
    } catch {
        throw new RetrievalError('transient-network', 'yt-dlp returned malformed metadata');
    }

    const info = YtDlpVideoInfoSchema.parse(raw);
    const formats: FormatCandidate[] = [];
    for (const entry of info.formats ?? []) {
        const parsed = YtDlpFormatSchema.safeParse(entry);
        if (!parsed.success) continue;
        const candidate = toFormatCandidate(parsed.data);
        if (candidate) formats.push(candidate);
    }

    return {
        title: info.title || info.id || 'Unknown',
        duration: info.duration ?? undefined,
        formats,
    };
}

export function cookieArgs(jar: CookieJar): string[] {
    switch (jar.kind) {
        case 'file':
            return ['--cookies', jar.path];
        case 'browser':
            return ['--cookies-from-browser', jar.browser];
        case 'none':
            return [];
    }
}

export function extractorArgs(playerClients: string[]): string[] {
    if (playerClients.length === 0) return [];
    return ['--extractor-args', `youtube:player_client=${playerClients.join(',')}`];
}

/**
 * Build download arguments; '%' is escaped so the destination is used literally
 */
export function buildDownloadArgs(request: RetrievalRequest): string[] {
    return [
        '-f', request.formatSpec,
        '--merge-output-format', 'mp4',
        '--remux-video', 'mp4',
        '-o', request.destinationPath.replace(/%/g, '%%'),
        '--no-playlist',
        '--no-mtime',
        '--newline',
        '--ignore-config',
        '--socket-timeout', '60',
        '--fragment-retries', '15',
        ...extractorArgs(request.playerClients),
        ...cookieArgs(request.cookieJar),
        request.url,
    ];
}

// ============================================================================
// Progress
// ============================================================================

export interface ProgressLine {
    percentage: number;
    downloadedBytes: number;
    totalBytes: number;
    speed: number; // bytes per second
    eta: number; // seconds
}

const SIZE_UNITS: Record<string, number> = {
    B: 1,
    KiB: 1024,
    MiB: 1024 ** 2,
    GiB: 1024 ** 3,
    TiB: 1024 ** 4,
    KB: 1000,
    MB: 1000 ** 2,
    GB: 1000 ** 3,
    TB: 1000 ** 4,
};

function toBytes(value: string, unit: string): number {
    return Math.round(parseFloat(value) * (SIZE_UNITS[unit] ?? 0));
}

/**
 * Parse a --newline progress line such as
 * `[download]  42.0% of ~ 10.00MiB at 1.00MiB/s ETA 00:05`
 */
export function parseProgressLine(line: string): ProgressLine | null {
    const percent = line.match(/^\[download\]\s+(\d+(?:\.\d+)?)%/);
    if (!percent?.[1]) return null;

    const percentage = parseFloat(percent[1]);
    const total = line.match(/\sof\s+~?\s*(\d+(?:\.\d+)?)\s*((?:[KMGT]i?)?B)\b/);
    const speed = line.match(/\sat\s+(\d+(?:\.\d+)?)\s*((?:[KMGT]i?)?B)\/s/);
    const eta = line.match(/\sETA\s+(\d+(?::\d+)*)/);

    const totalBytes = total?.[1] && total[2] ? toBytes(total[1], total[2]) : 0;
    return {
        percentage,
        totalBytes,
        downloadedBytes: Math.round((totalBytes * percentage) / 100),
        speed: speed?.[1] && speed[2] ? toBytes(speed[1], speed[2]) : 0,
        eta: eta?.[1] ? eta[1].split(':').reduce((seconds, part) => seconds * 60 + parseInt(part, 10), 0) : 0,
    };
}

// ============================================================================
// Partial files
// ============================================================================

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Leftovers of an interrupted download among a directory listing:
 * per-format streams (`name.f137.mp4`), merge temporaries (`name.temp.mp4`),
 * `.part`/`.ytdl` files and their fragments.
 */
export function partialFilesFor(destinationPath: string, names: string[]): string[] {
    const directory = path.dirname(destinationPath);
    const file = escapeRegExp(path.basename(destinationPath));
    const stem = escapeRegExp(path.basename(destinationPath).replace(/\.mp4$/i, ''));
    const pattern = new RegExp(
        `^(?:${stem}\\.(?:f[\\w-]+|temp)\\.\\w+|${file})(?:\\.part(?:-Frag\\d+)?|\\.ytdl)*$`,
    );
    return names.filter((name) => pattern.test(name)).map((name) => path.join(directory, name));
}

export interface YtDlpProviderOptions {
    binaryPath?: string;
    ffmpegPath?: string;
    timeout?: number; // ms, 0 disables
    killGraceMs?: number;
    metadataTimeout?: number;
    cookieCheckUrl?: string;
}

export class YtDlpProvider implements RetrievalEngine {
    readonly name = 'yt-dlp';

    private readonly binaryPath: string;
    private readonly ffmpegPath: string;
    private readonly timeout: number;
    private readonly killGraceMs: number;
    private readonly metadataTimeout: number;
    private readonly cookieCheckUrl: string;
    private readonly activeProcesses = new Map<string, ChildProcess>();

    constructor(options: YtDlpProviderOptions = {}) {
        this.binaryPath = options.binaryPath || 'yt-dlp';
        this.ffmpegPath = options.ffmpegPath || 'ffmpeg';
        this.timeout = options.timeout ?? 1800000;
        this.killGraceMs = options.killGraceMs ?? 5000;
        this.metadataTimeout = options.metadataTimeout ?? 60000;
        this.cookieCheckUrl = options.cookieCheckUrl || 'https://www.youtube.com/@YouTube/videos';
    }

    async inspect(url: string, cookieJar: CookieJar, options: InspectOptions): Promise<MediaInfo> {
        const validUrl = this.validateUrl(url);
        const args = [
            '--dump-json',
            '--no-playlist',
            '--no-warnings',
            '--skip-download',
            '--ignore-config',
            ...extractorArgs(options.playerClients),
            ...cookieArgs(cookieJar),
            validUrl,
        ];

        const { stdout } = await this.run(args, { timeout: this.metadataTimeout, signal: options.signal });
        return parseMetadataOutput(stdout);
    }

    async retrieve(request: RetrievalRequest): Promise<RetrievalResult> {
        this.validateUrl(request.url);
        logger.info(`[${this.name}] Download started`, {
            jobId: request.jobId,
            format: request.formatSpec,
        });

        try {
            const { stderr } = await this.run(buildDownloadArgs(request), {
                jobId: request.jobId,
                timeout: this.timeout,
                signal: request.signal,
                onProgress: (progress) => {
                    request.onProgress?.({ jobId: request.jobId, ...progress });
                },
            });

            let filesize: number;
            try {
                filesize = (await fs.stat(request.destinationPath)).size;
            } catch {
                throw new RetrievalError(
                    'fragment-unavailable',
                    'yt-dlp finished but no output file was created',
                    request.formatIds,
                );
            }

            return {
                outputPath: request.destinationPath,
                filesize,
                warnings: extractWarnings(stderr),
            };
        } catch (error) {
            if (!(error instanceof RetrievalError && error.kind === 'format-unavailable')) {
                await this.removePartials(request.destinationPath);
            }
            if (error instanceof RetrievalError && error.kind === 'format-unavailable' && error.formatIds.length === 0) {
                // yt-dlp does not say which stream of a merge is gone
                throw new RetrievalError(error.kind, error.message, request.formatIds.slice(0, 1));
            }
            throw error;
        }
    }

    async checkBrowserCookies(browser: string): Promise<boolean> {
        const args = [
            '--cookies-from-browser', browser,
            '--flat-playlist',
            '--playlist-items', '1',
            '--dump-single-json',
            '--skip-download',
            '--no-warnings',
            '--ignore-config',
            this.cookieCheckUrl,
        ];

        try {
            const { stdout } = await this.run(args, { timeout: this.metadataTimeout });
            const parsed: unknown = JSON.parse(stdout);
            return typeof parsed === 'object' && parsed !== null && ('entries' in parsed || 'id' in parsed);
        } catch (error) {
            logger.debug(`[${this.name}] Browser cookies unavailable`, {
                browser,
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    }

    /**
     * Whether ffmpeg runs; yt-dlp needs it to merge separate streams into mp4
     */
    async checkMerger(): Promise<boolean> {
        try {
            await this.run(['-version'], { binary: this.ffmpegPath, timeout: this.metadataTimeout });
            return true;
        } catch (error) {
            logger.debug(`[${this.name}] ffmpeg unavailable`, {
                path: this.ffmpegPath,
                error: summarizeError(error),
            });
            return false;
        }
    }

    /**
     * Kill all active downloads
     */
    killAll(): void {
        for (const [jobId, proc] of this.activeProcesses) {
            proc.kill('SIGKILL');
            this.activeProcesses.delete(jobId);
        }
    }

    private validateUrl(url: string): string {
        const parsed = UrlSchema.safeParse(url);
        if (!parsed.success) {
            throw new RetrievalError('not-found', `Invalid URL: ${url}`);
        }
        return parsed.data;
    }

    private async removePartials(destinationPath: string): Promise<void> {
        let names: string[] = [];
        try {
            names = await fs.readdir(path.dirname(destinationPath));
        } catch (error) {
            logger.debug(`[${this.name}] Cannot list output directory`, { error: summarizeError(error) });
        }

        const candidates = new Set([
            destinationPath,
            `${destinationPath}.part`,
            `${destinationPath}.ytdl`,
            ...partialFilesFor(destinationPath, names),
        ]);
        await Promise.all([...candidates].map((file) => fs.rm(file, { force: true })));
    }

    /**
     * Execute yt-dlp (or another tool); rejects with a classified RetrievalError.
     * After an abort or timeout the promise settles only once the process has exited.
     */
    private run(
        args: string[],
        options: {
            binary?: string;
            jobId?: string;
            timeout?: number;
            signal?: AbortSignal;
            onProgress?: (progress: ProgressLine) => void;
        },
    ): Promise<{ stdout: string; stderr: string }> {
        const binary = options.binary ?? this.binaryPath;

        return new Promise((resolve, reject) => {
            if (options.signal?.aborted) {
                reject(new RetrievalError('cancelled', 'Download cancelled'));
                return;
            }

            let stdout = '';
            let stderr = '';
            let pendingLine = '';
            let settled = false;
            let stopping: Error | undefined;
            let timer: NodeJS.Timeout | undefined;
            let killTimer: NodeJS.Timeout | undefined;

            const proc = spawn(binary, args, {
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            if (options.jobId) {
                this.activeProcesses.set(options.jobId, proc);
            }

            const finish = (error?: Error) => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                if (killTimer) clearTimeout(killTimer);
                options.signal?.removeEventListener('abort', onAbort);
                if (error) reject(error);
                else resolve({ stdout, stderr });
            };

            // The reason is kept until 'close' so no file is still being written when we settle
            const stop = (reason: Error, signal: NodeJS.Signals) => {
                if (settled || stopping) return;
                stopping = reason;
                if (timer) clearTimeout(timer);
                proc.kill(signal);
                if (signal !== 'SIGKILL') {
                    killTimer = setTimeout(() => proc.kill('SIGKILL'), this.killGraceMs);
                }
            };

            const onAbort = () => stop(new RetrievalError('cancelled', 'Download cancelled'), 'SIGTERM');
            options.signal?.addEventListener('abort', onAbort, { once: true });

            const reportProgress = (line: string) => {
                const progress = parseProgressLine(line.trim());
                if (progress) options.onProgress?.(progress);
            };

            proc.stdout?.on('data', (data: Buffer) => {
                const text = data.toString();
                stdout += text;

                if (options.onProgress) {
                    const lines = (pendingLine + text).split(/\r?\n|\r/);
                    pendingLine = lines.pop() ?? '';
                    lines.forEach(reportProgress);
                }
            });

            proc.stderr?.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            proc.on('close', (code) => {
                if (options.jobId) this.activeProcesses.delete(options.jobId);
                if (pendingLine) reportProgress(pendingLine);

                if (stopping) {
                    finish(stopping);
                    return;
                }
                if (code === 0) {
                    finish();
                    return;
                }
                const message = extractErrorMessage(stderr || `${path.basename(binary)} exited with code ${code}`);
                const kind = classifyYtDlpError(stderr);
                finish(kind ? new RetrievalError(kind, message) : new Error(message));
            });

            proc.on('error', (error: NodeJS.ErrnoException) => {
                if (options.jobId) this.activeProcesses.delete(options.jobId);
                finish(
                    error.code === 'ENOENT'
                        ? new Error(`${binary === this.binaryPath ? 'yt-dlp' : path.basename(binary)} executable not found: ${binary}`)
                        : error,
                );
            });

            if (options.timeout) {
                timer = setTimeout(() => {
                    stop(new RetrievalError('transient-network', 'Download timeout'), 'SIGKILL');
                }, options.timeout);
            }
        });
    }
}
