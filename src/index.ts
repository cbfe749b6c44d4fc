#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import readline from 'readline/promises';
import chalk from 'chalk';
import { Command } from 'commander';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { attachLogFile, logError, logger } from './utils/logger';
import { LinkParser, invalidEntries, validEntries } from './utils/LinkParser';
import { exitCodeFor, formatProgress, renderQueue, renderReport } from './utils/reportFormatter';
import { YtDlpProvider } from './download/providers/YtDlpProvider';
import { createRunContext } from './download/core/RunContext';
import { QueueOrchestrator } from './download/core/QueueOrchestrator';
import { DownloadEvent, RunPreconditionError } from './download/core/types';

export type CliOptions = {
  linksFile?: string;
  confirm: boolean;
  output?: string;
  concurrency?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name('tubefetch')
    .description(
      'Download video links to the output folder in the highest available quality.',
    )
    .argument('[urls...]', 'links or video IDs; interactive input when omitted')
    .option('--links-file <path>', 'text file containing links')
    .option('--no-confirm', 'start downloads without the confirmation prompt')
    .option('-o, --output <dir>', 'output directory')
    .option('-c, --concurrency <n>', 'concurrent downloads (1-4)');
}

/**
 * Environment for loadConfig with the command-line overrides applied.
 * A relative --output is taken from the working directory, not BASE_DIR.
 */
export function configEnvironment(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return {
    ...env,
    OUTPUT_DIR: options.output ? path.resolve(options.output) : env.OUTPUT_DIR,
    MAX_CONCURRENT_DOWNLOADS: options.concurrency ?? env.MAX_CONCURRENT_DOWNLOADS,
  };
}

function initializeSentry(dsn?: string): void {
  if (!dsn) return;
  Sentry.init({
    dsn,
    tracesSampleRate: 0,
  });
}

async function collectRawInput(
  options: CliOptions,
  urls: string[],
): Promise<string> {
  const chunks: string[] = [];

  if (options.linksFile) {
    try {
      chunks.push(await fs.readFile(options.linksFile, 'utf-8'));
    } catch {
      throw new RunPreconditionError(
        'links-file',
        `Links file does not exist: ${options.linksFile}`,
      );
    }
  }
  if (urls.length > 0) {
    chunks.push(urls.join(' '));
  }
  if (chunks.length > 0) {
    return chunks.join('\n');
  }

  console.log(
    chalk.bold('Paste one or more links.\n') +
      'You can paste multiple lines or comma-separated links.\n' +
      'Press Enter on an empty line to start.',
  );

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const lines: string[] = [];
  try {
    for (;;) {
      const line = (await rl.question(chalk.cyan('link> '))).trim();
      if (!line) break;
      lines.push(line);
    }
  } finally {
    rl.close();
  }
  return lines.join('\n');
}

async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    const answer = (await rl.question(`${question} [Y/n] `)).trim().toLowerCase();
    return answer === '' || answer === 'y' || answer === 'yes';
  } finally {
    rl.close();
  }
}

function printEvent(event: DownloadEvent, milestones: Map<number, number>): void {
  const label = chalk.bold(`Video ${event.index + 1}`);
  switch (event.type) {
    case 'task:started':
      console.log(`${label} ${event.url}`);
      break;
    case 'task:progress': {
      const percentage = Number(event.data?.percentage ?? 0);
      const bucket = Math.floor(percentage / 25) * 25;
      if (bucket > (milestones.get(event.index) ?? -1)) {
        milestones.set(event.index, bucket);
        const speed = Number(event.data?.speed ?? 0);
        const eta = Number(event.data?.eta ?? 0);
        console.log(chalk.gray(`${label} ${formatProgress(percentage, speed, eta)}`));
      }
      break;
    }
    case 'task:completed':
      console.log(`${chalk.green('OK')} ${label} -> ${String(event.data?.outputPath ?? '')}`);
      break;
    case 'task:failed':
      console.log(`${chalk.red('FAILED')} ${label} -> ${String(event.data?.reason ?? '')}`);
      break;
    case 'task:cancelled':
      console.log(`${chalk.yellow('CANCELLED')} ${label}`);
      break;
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  const config = loadConfig(configEnvironment(options));
  logger.level = config.logLevel;
  initializeSentry(config.sentryDsn);
  await fs.mkdir(config.systemDirectory, { recursive: true });
  attachLogFile(path.join(config.systemDirectory, 'tubefetch.log'));

  const engine = new YtDlpProvider({
    binaryPath: config.ytDlpPath,
    ffmpegPath: config.ffmpegPath,
    timeout: config.downloadTimeout,
    killGraceMs: config.cancelGraceMs,
  });
  const context = createRunContext(config, engine);

  console.log(chalk.bold.cyan('tubefetch'));
  console.log('Automatic cookie detection + highest quality downloader.\n');

  // Cached: the orchestrator reuses this resolution
  const cookieJar = await context.cookieResolver.resolve();
  const hasFfmpeg = await engine.checkMerger();
  console.log(chalk.bold('Runtime'));
  console.log(`  Output folder   ${config.outputDirectory}`);
  console.log(`  Cookie mode     ${cookieJar.description}`);
  console.log(
    `  ffmpeg in PATH  ${hasFfmpeg ? 'yes' : chalk.yellow('no (required for reliable mp4 merging)')}`,
  );
  console.log(`  Engine          ${config.ytDlpPath}\n`);

  const entries = new LinkParser().parse(
    await collectRawInput(options, program.args),
  );

  for (const entry of invalidEntries(entries)) {
    console.log(chalk.yellow(`Skipping unrecognized input: ${entry.rawInput}`));
  }
  if (validEntries(entries).length === 0) {
    console.log(chalk.red('No valid video links were found.'));
    return 1;
  }

  console.log(renderQueue(entries));
  if (options.confirm && !(await confirm('Start download now?'))) {
    console.log('Canceled.');
    return 0;
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      engine.killAll();
      process.exit(130);
    }
    console.log(chalk.yellow('\nInterrupted, finishing active downloads...'));
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const orchestrator = new QueueOrchestrator(context);
  const milestones = new Map<number, number>();
  orchestrator.onDownloadEvent((event) => printEvent(event, milestones));

  try {
    const report = await orchestrator.run(entries, {
      signal: controller.signal,
    });
    console.log(`\n${renderReport(report)}`);
    console.log(`Output folder: ${config.outputDirectory}`);
    return report.cancelled ? 130 : exitCodeFor(report);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (error instanceof RunPreconditionError) {
        console.error(chalk.red(error.message));
      } else {
        const err = error instanceof Error ? error : new Error(String(error));
        logError(err, { phase: 'run' });
      }
      process.exitCode = 1;
    });
}
