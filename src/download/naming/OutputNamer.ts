/**
 * OutputNamer - Collision-free destination paths inside the output directory
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../../utils/logger';
import { LinkEntry } from '../../types';

const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

export interface OutputNamerOptions {
    outputDirectory: string;
    maxTitleBytes?: number;
    extension?: string;
}

export interface OutputMetadata {
    title?: string;
    extension?: string;
}

/**
 * Cut a string to a UTF-8 byte budget without splitting a character
 */
export function truncateBytes(value: string, maxBytes: number): string {
    if (Buffer.byteLength(value, 'utf8') <= maxBytes) return value;

    let result = '';
    let used = 0;
    for (const char of value) {
        const size = Buffer.byteLength(char, 'utf8');
        if (used + size > maxBytes) break;
        result += char;
        used += size;
    }
    return result;
}

/**
 * Sanitize a title into a file-system safe base name
 */
export function sanitizeTitle(title: string, maxBytes: number = 200): string {
    let name = title
        // Remove dangerous characters
        .replace(/[<>:"/\\|?*\x00-\x1F\x7F]/g, '_')
        // Collapse whitespace
        .replace(/\s+/g, ' ')
        // Replace multiple underscores
        .replace(/_+/g, '_')
        // Remove leading/trailing dots and spaces
        .replace(/^[\s.]+|[\s.]+$/g, '');

    if (RESERVED_NAMES.test(name)) {
        name = `_${name}`;
    }

    return truncateBytes(name, maxBytes).replace(/[\s.]+$/g, '');
}

export class OutputNamer {
    private readonly outputDirectory: string;
    private readonly maxTitleBytes: number;
    private readonly extension: string;
    private readonly claimed = new Set<string>();

    constructor(options: OutputNamerOptions) {
        this.outputDirectory = path.resolve(options.outputDirectory);
        this.maxTitleBytes = options.maxTitleBytes ?? 200;
        this.extension = options.extension ?? 'mp4';
    }

    getOutputDirectory(): string {
        return this.outputDirectory;
    }

    /**
     * Create the output directory (idempotent)
     */
    async prepare(): Promise<string> {
        await fs.promises.mkdir(this.outputDirectory, { recursive: true });
        logger.debug('📁 Output directory ready', { path: this.outputDirectory });
        return this.outputDirectory;
    }

    /**
     * Compute and claim a destination path. The check and the claim run
     * without yielding, so concurrent jobs never receive the same path.
     */
    nameFor(link: LinkEntry, metadata: OutputMetadata = {}): string {
        const base = sanitizeTitle(metadata.title ?? '', this.maxTitleBytes) || link.canonicalId;
        const extension = (metadata.extension ?? this.extension).replace(/^\./, '');

        let candidate = this.pathFor(base, extension);
        for (let n = 1; this.isTaken(candidate); n++) {
            candidate = this.pathFor(`${base} (${n})`, extension);
        }

        this.claimed.add(candidate);
        logger.debug('Destination claimed', { link: link.canonicalId, path: candidate });
        return candidate;
    }

    isClaimed(filePath: string): boolean {
        return this.claimed.has(path.resolve(filePath));
    }

    private pathFor(base: string, extension: string): string {
        return path.join(this.outputDirectory, `${base}.${extension}`);
    }

    private isTaken(candidate: string): boolean {
        return this.claimed.has(candidate) || fs.existsSync(candidate);
    }
}
