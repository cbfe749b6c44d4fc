/**
 * RunContext - Everything one run owns, wired from configuration.
 * A fresh context per run keeps the cookie cache and the claimed
 * output paths from leaking between runs.
 */

import { DownloaderConfig } from '../../types';
import { CookieResolver } from '../../utils/CookieResolver';
import { FormatSelector } from '../quality/FormatSelector';
import { OutputNamer } from '../naming/OutputNamer';
import { DownloadExecutor } from './DownloadExecutor';
import { RetrievalEngine } from './types';

export interface RunContext {
    config: DownloaderConfig;
    cookieResolver: CookieResolver;
    outputNamer: OutputNamer;
    executor: DownloadExecutor;
}

export function createRunContext(config: DownloaderConfig, engine: RetrievalEngine): RunContext {
    const cookieResolver = new CookieResolver({
        baseDirectory: config.baseDirectory,
        systemDirectory: config.systemDirectory,
        browsers: config.cookieBrowsers,
        checkBrowser: (browser) => engine.checkBrowserCookies(browser),
    });

    const formatSelector = new FormatSelector(engine, {
        unreliableProtocols: config.unreliableProtocols,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
    });

    const outputNamer = new OutputNamer({
        outputDirectory: config.outputDirectory,
        maxTitleBytes: config.maxTitleBytes,
    });

    const executor = new DownloadExecutor(engine, formatSelector, {
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
        strategies: config.strategies,
        minOutputBytes: config.minOutputBytes,
    });

    return { config, cookieResolver, outputNamer, executor };
}
