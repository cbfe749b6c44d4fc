import path from 'path';
import chalk from 'chalk';
import { LinkEntry, RunReport, RunReportEntry } from '../types';

/**
 * Format file size
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  if (unitIndex === 0) return `${Math.floor(size)} B`;
  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Seconds as mm:ss, or h:mm:ss past an hour; '-' when unknown
 */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return '-';

  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = String(total % 60).padStart(2, '0');
  return hours > 0
    ? `${hours}:${String(minutes).padStart(2, '0')}:${secs}`
    : `${String(minutes).padStart(2, '0')}:${secs}`;
}

export function formatProgress(percentage: number, speed: number, eta: number): string {
  const rate = speed > 0 ? `${formatBytes(speed)}/s` : '-';
  return `${percentage.toFixed(1)}%  ${rate}  ETA ${formatEta(eta)}`;
}

/**
 * 0 only when every entry succeeded
 */
export function exitCodeFor(report: RunReport): number {
  return report.entries.every((entry) => entry.outcome === 'success') ? 0 : 1;
}

export function summarize(report: RunReport): { succeeded: number; failed: number } {
  const succeeded = report.entries.filter((e) => e.outcome === 'success').length;
  return { succeeded, failed: report.entries.length - succeeded };
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

function ellipsize(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 3)}...` : value;
}

export function renderQueue(entries: LinkEntry[]): string {
  const lines = [chalk.bold('Download Queue')];
  entries
    .filter((entry) => entry.isValid)
    .forEach((entry, i) => {
      lines.push(`${chalk.cyan(String(i + 1).padStart(3))}  ${entry.url ?? entry.canonicalId}`);
    });
  return lines.join('\n');
}

function detailFor(entry: RunReportEntry): string {
  if (entry.outcome === 'success') {
    const label = entry.strategy && entry.formatLabel
      ? `${entry.strategy} | ${entry.formatLabel}`
      : entry.formatLabel ?? '';
    const parts = [label, entry.filesize ? formatBytes(entry.filesize) : ''];
    if (entry.warnings.length > 0) parts.push(`${entry.warnings.length} warning(s)`);
    return parts.filter((p) => p.length > 0).join(', ');
  }
  return entry.detail ? `${entry.reason}: ${entry.detail}` : entry.reason ?? 'failed';
}

/**
 * Results table: #, status, title, file, details
 */
export function renderReport(report: RunReport): string {
  const lines = [chalk.bold('Results')];
  lines.push(
    `${pad('#', 3)}  ${pad('Status', 6)}  ${pad('Title', 40)}  ${pad('File', 40)}  Details`,
  );

  for (const entry of report.entries) {
    const status = entry.outcome === 'success' ? chalk.green(pad('OK', 6)) : chalk.red('FAILED');
    const title = pad(ellipsize(entry.title || '-', 40), 40);
    const file = pad(ellipsize(entry.outputPath ? path.basename(entry.outputPath) : '-', 40), 40);
    lines.push(
      `${String(entry.index + 1).padStart(3)}  ${status}  ${title}  ${file}  ${detailFor(entry)}`,
    );
  }

  const { succeeded, failed } = summarize(report);
  lines.push('');
  lines.push(`Completed. Success: ${succeeded} | Failed: ${failed}`);
  if (report.cancelled) {
    lines.push(chalk.yellow('Run was cancelled; unfinished items are listed as cancelled.'));
  }
  return lines.join('\n');
}
