import fs from 'fs/promises';
import path from 'path';
import { CookieJar, CookieSource } from '../types';
import { logger } from './logger';

export type BrowserCookieCheck = (browser: string) => Promise<boolean>;

export interface CookieResolverOptions {
    baseDirectory: string;
    systemDirectory: string;
    browsers: string[];
    checkBrowser: BrowserCookieCheck;
    cookieFileName?: string;
}

export const NO_CREDENTIALS: CookieJar = {
    kind: 'none',
    description: 'no cookies detected',
};

/**
 * Ordered candidate list: project-root cookie file, system cookie file,
 * resources/ cookie file, then each browser store in preference order
 */
export function buildCookieCatalog(options: {
    baseDirectory: string;
    systemDirectory: string;
    browsers: string[];
    cookieFileName?: string;
}): CookieSource[] {
    const fileName = options.cookieFileName ?? 'cookies.txt';
    const files = [
        path.join(options.baseDirectory, fileName),
        path.join(options.systemDirectory, fileName),
        path.join(options.baseDirectory, 'resources', fileName),
    ];

    const catalog: CookieSource[] = files.map((location, i) => ({
        kind: 'file',
        location,
        priority: i + 1,
    }));

    options.browsers.forEach((browser, i) => {
        catalog.push({
            kind: 'browser',
            location: browser,
            priority: files.length + i + 1,
        });
    });

    return catalog;
}

/**
 * CookieResolver - Picks the first usable cookie source for a run
 * The result is cached; browsers are checked at most once per resolver
 * so decryption prompts are not repeated per item
 */
export class CookieResolver {
    private readonly catalog: CookieSource[];
    private readonly checkBrowser: BrowserCookieCheck;
    private readonly rejected: CookieSource[] = [];
    private resolution?: Promise<CookieJar>;

    constructor(options: CookieResolverOptions) {
        this.catalog = buildCookieCatalog(options);
        this.checkBrowser = options.checkBrowser;
    }

    /**
     * Resolve once; later and concurrent callers share the same result
     */
    resolve(): Promise<CookieJar> {
        if (!this.resolution) {
            this.resolution = this.resolveCandidates();
        }
        return this.resolution;
    }

    getCatalog(): CookieSource[] {
        return [...this.catalog];
    }

    getRejected(): CookieSource[] {
        return [...this.rejected];
    }

    private async resolveCandidates(): Promise<CookieJar> {
        for (const source of this.catalog) {
            if (this.rejected.includes(source)) continue;

            const usable = source.kind === 'file'
                ? await this.isUsableFile(source.location)
                : await this.isUsableBrowser(source.location);

            if (usable) {
                const jar: CookieJar = source.kind === 'file'
                    ? { kind: 'file', path: source.location, description: `cookie file: ${source.location}` }
                    : { kind: 'browser', browser: source.location, description: `browser cookies: ${source.location}` };
                logger.info('🍪 Cookie source selected', {
                    kind: source.kind,
                    location: source.location,
                    priority: source.priority,
                });
                return jar;
            }

            this.rejected.push(source);
            logger.debug('Cookie source rejected', {
                kind: source.kind,
                location: source.location,
            });
        }

        logger.warn('⚠️ No usable cookie source, continuing unauthenticated', {
            tried: this.rejected.length,
        });
        return NO_CREDENTIALS;
    }

    private async isUsableFile(filePath: string): Promise<boolean> {
        try {
            const stats = await fs.stat(filePath);
            if (!stats.isFile() || stats.size === 0) return false;
            await fs.access(filePath, fs.constants.R_OK);
            return true;
        } catch {
            return false;
        }
    }

    private async isUsableBrowser(browser: string): Promise<boolean> {
        try {
            return await this.checkBrowser(browser);
        } catch (error) {
            logger.debug('Browser cookie check failed', {
                browser,
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    }
}
