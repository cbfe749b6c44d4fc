import { DownloadStrategy } from './download';

export interface DownloaderConfig {
  baseDirectory: string;
  outputDirectory: string;
  systemDirectory: string;
  maxConcurrentDownloads: number;
  retryAttempts: number;
  retryDelayMs: number;
  downloadTimeout: number; // ms per attempt, 0 = no timeout
  cancelGraceMs: number;
  cookieBrowsers: string[];
  strategies: DownloadStrategy[];
  unreliableProtocols: string[];
  ytDlpPath: string;
  ffmpegPath: string;
  maxTitleBytes: number;
  minOutputBytes: number;
  logLevel: string;
  sentryDsn?: string;
}
