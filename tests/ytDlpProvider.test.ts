import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  YtDlpProvider,
  buildDownloadArgs,
  classifyYtDlpError,
  cookieArgs,
  extractErrorMessage,
  extractWarnings,
  extractorArgs,
  parseMetadataOutput,
  parseProgressLine,
  partialFilesFor,
  toFormatCandidate,
} from '../src/download/providers/YtDlpProvider';
import { DownloadProgress, RetrievalError, RetrievalRequest } from '../src/download/core/types';
import { NO_CREDENTIALS } from '../src/utils/CookieResolver';

describe('YtDlpProvider output handling', () => {
  describe('classifyYtDlpError', () => {
    it('should map yt-dlp messages to failure kinds', () => {
      expect(classifyYtDlpError("ERROR: [youtube] abc: Private video. Sign in if you've been granted access")).toBe(
        'access-denied',
      );
      expect(classifyYtDlpError('ERROR: [youtube] abc: Requested format is not available')).toBe('format-unavailable');
      expect(classifyYtDlpError('ERROR: [youtube] abc: Video unavailable')).toBe('not-found');
      expect(classifyYtDlpError('ERROR: Unable to download webpage: <urlopen error timed out>')).toBe(
        'transient-network',
      );
      expect(classifyYtDlpError('OSError: [Errno 28] No space left on device')).toBe('disk-error');
      expect(classifyYtDlpError('ERROR: fragment 12 not found, unable to continue')).toBe('fragment-unavailable');
    });

    it('should let the first matching rule win', () => {
      expect(classifyYtDlpError('ERROR: unable to download video data: HTTP Error 403: Forbidden')).toBe(
        'fragment-unavailable',
      );
    });

    it('should leave unknown output unclassified', () => {
      expect(classifyYtDlpError('ERROR: something new happened')).toBeUndefined();
    });
  });

  describe('extractErrorMessage', () => {
    it('should prefer the last ERROR line', () => {
      expect(extractErrorMessage('WARNING: slow\nERROR: first\nERROR: second\n')).toBe('second');
    });

    it('should fall back to the last line', () => {
      expect(extractErrorMessage('line one\nplain failure\n')).toBe('plain failure');
      expect(extractErrorMessage('')).toBe('yt-dlp failed without output');
    });
  });

  it('should collect warnings', () => {
    expect(extractWarnings('WARNING: a\nERROR: b\n  WARNING: c')).toEqual(['a', 'c']);
  });

  describe('toFormatCandidate', () => {
    it('should classify video-only, audio-only and combined formats', () => {
      expect(
        toFormatCandidate({
          format_id: '137',
          ext: 'mp4',
          height: 1080,
          vcodec: 'avc1.640028',
          acodec: 'none',
          tbr: 4400.4,
          protocol: 'https',
        }),
      ).toEqual({
        kind: 'video-only',
        hasVideo: true,
        hasAudio: false,
        formatId: '137',
        container: 'mp4',
        resolutionRank: 1080,
        bitrate: 4400,
        protocol: 'https',
        hasDrm: false,
      });

      expect(toFormatCandidate({ format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2', abr: 129.5 })).toEqual({
        kind: 'audio-only',
        hasVideo: false,
        hasAudio: true,
        formatId: '140',
        container: 'm4a',
        resolutionRank: 0,
        bitrate: 130,
        protocol: 'https',
        hasDrm: false,
      });

      expect(
        toFormatCandidate({ format_id: '18', height: 360, vcodec: 'avc1', acodec: 'mp4a', vbr: 300, has_drm: true }),
      ).toMatchObject({ kind: 'combined', resolutionRank: 360, bitrate: 300, container: 'unknown', hasDrm: true });
    });

    it('should drop formats without streams or ids', () => {
      expect(toFormatCandidate({ format_id: 'sb0', vcodec: 'none', acodec: 'none' })).toBeNull();
      expect(toFormatCandidate({ vcodec: 'avc1', acodec: 'mp4a' })).toBeNull();
    });
  });

  describe('parseMetadataOutput', () => {
    it('should keep only usable formats', () => {
      const info = parseMetadataOutput(
        JSON.stringify({
          id: 'abcdefghijk',
          title: 'Test Video',
          duration: 212,
          formats: [
            { format_id: '18', height: 360, vcodec: 'avc1', acodec: 'mp4a' },
            { format_id: 'sb0', vcodec: 'none', acodec: 'none' },
            { format_id: 5 },
            'junk',
          ],
        }),
      );

      expect(info.title).toBe('Test Video');
      expect(info.duration).toBe(212);
      expect(info.formats.map((f) => f.formatId)).toEqual(['18']);
    });

    it('should fall back to the video ID for untitled videos', () => {
      expect(parseMetadataOutput('{"id":"abcdefghijk"}')).toEqual({ title: 'abcdefghijk', duration: undefined, formats: [] });
    });

    it('should reject malformed output as a transient failure', () => {
      let caught: unknown;
      try {
        parseMetadataOutput('{"id": truncated');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RetrievalError);
      expect(caught).toMatchObject({ kind: 'transient-network', message: 'yt-dlp returned malformed metadata' });
    });
  });

  describe('arguments', () => {
    it('should pass the cookie jar', () => {
      expect(cookieArgs({ kind: 'file', path: '/base/cookies.txt', description: 'file' })).toEqual([
        '--cookies',
        '/base/cookies.txt',
      ]);
      expect(cookieArgs({ kind: 'browser', browser: 'firefox', description: 'browser' })).toEqual([
        '--cookies-from-browser',
        'firefox',
      ]);
      expect(cookieArgs(NO_CREDENTIALS)).toEqual([]);
    });

    it('should join player clients', () => {
      expect(extractorArgs(['tv_downgraded', 'web'])).toEqual([
        '--extractor-args',
        'youtube:player_client=tv_downgraded,web',
      ]);
      expect(extractorArgs([])).toEqual([]);
    });

    it('should build the download command with a literal destination', () => {
      expect(
        buildDownloadArgs({
          jobId: '0:abcdefghijk',
          url: 'https://www.youtube.com/watch?v=abcdefghijk',
          formatSpec: '137+140',
          formatIds: ['137', '140'],
          cookieJar: NO_CREDENTIALS,
          destinationPath: '/videos/100% Real.mp4',
          playerClients: ['web'],
        }),
      ).toEqual([
        '-f', '137+140',
        '--merge-output-format', 'mp4',
        '--remux-video', 'mp4',
        '-o', '/videos/100%% Real.mp4',
        '--no-playlist',
        '--no-mtime',
        '--newline',
        '--ignore-config',
        '--socket-timeout', '60',
        '--fragment-retries', '15',
        '--extractor-args', 'youtube:player_client=web',
        'https://www.youtube.com/watch?v=abcdefghijk',
      ]);
    });
  });

  describe('parseProgressLine', () => {
    it('should read percentage, size, speed and ETA', () => {
      expect(parseProgressLine('[download]  42.0% of   10.00MiB at    1.00MiB/s ETA 00:05')).toEqual({
        percentage: 42,
        totalBytes: 10485760,
        downloadedBytes: 4404019,
        speed: 1048576,
        eta: 5,
      });
    });

    it('should accept estimated sizes and hour-long ETAs', () => {
      expect(parseProgressLine('[download]  10.0% of ~ 2.00GiB at 500.00KiB/s ETA 1:02:03 (frag 3/40)')).toEqual({
        percentage: 10,
        totalBytes: 2147483648,
        downloadedBytes: 214748365,
        speed: 512000,
        eta: 3723,
      });
    });

    it('should report zeros for unknown speed and ETA', () => {
      expect(parseProgressLine('[download]   0.0% of ~  1.00MiB at  Unknown B/s ETA Unknown')).toEqual({
        percentage: 0,
        totalBytes: 1048576,
        downloadedBytes: 0,
        speed: 0,
        eta: 0,
      });
    });

    it('should ignore lines that are not progress', () => {
      expect(parseProgressLine('[download] Destination: /videos/Test Video.mp4')).toBeNull();
      expect(parseProgressLine('[Merger] Merging formats into "Test Video.mp4"')).toBeNull();
    });
  });

  describe('partialFilesFor', () => {
    it('should match per-format streams, merge temporaries and fragments of the destination only', () => {
      const names = [
        'Test Video.f137.mp4.part',
        'Test Video.f140.m4a',
        'Test Video.temp.mp4',
        'Test Video.mp4.part-Frag12',
        'Test Video.mp4.ytdl',
        'Test Video.final cut.mp4',
        'Test Video (2).f137.mp4',
        'Other Video.f137.mp4',
      ];

      expect(partialFilesFor('/videos/Test Video.mp4', names)).toEqual([
        path.join('/videos', 'Test Video.f137.mp4.part'),
        path.join('/videos', 'Test Video.f140.m4a'),
        path.join('/videos', 'Test Video.temp.mp4'),
        path.join('/videos', 'Test Video.mp4.part-Frag12'),
        path.join('/videos', 'Test Video.mp4.ytdl'),
      ]);
    });

    it('should treat regex characters in titles literally', () => {
      expect(partialFilesFor('/videos/a+b (live).mp4', ['a+b (live).f22.mp4', 'aab (live).f22.mp4'])).toEqual([
        path.join('/videos', 'a+b (live).f22.mp4'),
      ]);
    });
  });
});

describe('YtDlpProvider process handling', () => {
  const SCRIPT = path.join(__dirname, 'helpers', 'fake-yt-dlp.sh');
  const URL = 'https://www.youtube.com/watch?v=abcdefghijk';
  let directory: string;

  beforeAll(async () => {
    await fs.chmod(SCRIPT, 0o755);
  });

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'tubefetch-ytdlp-'));
  });

  afterEach(async () => {
    delete process.env.FAKE_YTDLP_MODE;
    delete process.env.FAKE_YTDLP_ARGS_FILE;
    delete process.env.FAKE_YTDLP_EXIT_MARKER;
    await fs.rm(directory, { recursive: true, force: true });
  });

  function provider(options: { timeout?: number; killGraceMs?: number } = {}): YtDlpProvider {
    return new YtDlpProvider({ binaryPath: SCRIPT, timeout: options.timeout ?? 0, killGraceMs: options.killGraceMs ?? 2000 });
  }

  function request(mode: string, overrides: Partial<RetrievalRequest> = {}): RetrievalRequest {
    process.env.FAKE_YTDLP_MODE = mode;
    return {
      jobId: '0:abcdefghijk',
      url: URL,
      formatSpec: '22',
      formatIds: ['22'],
      cookieJar: NO_CREDENTIALS,
      destinationPath: path.join(directory, 'Test Video.mp4'),
      playerClients: ['web'],
      ...overrides,
    };
  }

  it('should read formats from the dumped metadata', async () => {
    process.env.FAKE_YTDLP_MODE = 'metadata';
    process.env.FAKE_YTDLP_ARGS_FILE = path.join(directory, 'args.txt');

    const info = await provider().inspect(
      URL,
      { kind: 'file', path: '/base/cookies.txt', description: 'cookies.txt' },
      { playerClients: ['ios_downgraded', 'android_vr'] },
    );

    expect(info.title).toBe('Test Video');
    expect(info.formats.map((format) => [format.formatId, format.kind])).toEqual([
      ['137', 'video-only'],
      ['140', 'audio-only'],
    ]);
    const args = (await fs.readFile(path.join(directory, 'args.txt'), 'utf8')).trim().split('\n');
    expect(args).toEqual([
      '--dump-json',
      '--no-playlist',
      '--no-warnings',
      '--skip-download',
      '--ignore-config',
      '--extractor-args',
      'youtube:player_client=ios_downgraded,android_vr',
      '--cookies',
      '/base/cookies.txt',
      URL,
    ]);
  });

  it('should return the file with warnings and report parsed progress', async () => {
    const progress: DownloadProgress[] = [];

    const result = await provider().retrieve(request('success', { onProgress: (p) => progress.push(p) }));

    expect(result).toEqual({
      outputPath: path.join(directory, 'Test Video.mp4'),
      filesize: 20000,
      warnings: ['[youtube] abcdefghijk: nsig extraction failed'],
    });
    expect(progress).toEqual([
      { jobId: '0:abcdefghijk', percentage: 42, totalBytes: 10485760, downloadedBytes: 4404019, speed: 1048576, eta: 5 },
      { jobId: '0:abcdefghijk', percentage: 100, totalBytes: 10485760, downloadedBytes: 10485760, speed: 2097152, eta: 0 },
    ]);
  });

  it('should treat a clean exit without a file as a missing fragment', async () => {
    await expect(provider().retrieve(request('no-output'))).rejects.toMatchObject({
      kind: 'fragment-unavailable',
      message: 'yt-dlp finished but no output file was created',
      formatIds: ['22'],
    });
  });

  it('should classify failures from the error output', async () => {
    await expect(provider().retrieve(request('private'))).rejects.toMatchObject({
      kind: 'access-denied',
      message: "[youtube] abcdefghijk: Private video. Sign in if you've been granted access to this video",
    });

    const unknown = provider().retrieve(request('unknown'));
    await expect(unknown).rejects.toThrow('something new happened');
    await expect(unknown).rejects.not.toBeInstanceOf(RetrievalError);
  });

  it('should blame only the video stream when a merged format disappears', async () => {
    await expect(
      provider().retrieve(request('format-gone', { formatSpec: '137+140', formatIds: ['137', '140'] })),
    ).rejects.toMatchObject({ kind: 'format-unavailable', formatIds: ['137'] });
  });

  it('should remove per-format and temporary files after a failed merge', async () => {
    await fs.writeFile(path.join(directory, 'Other Video.mp4'), 'keep');
    await fs.writeFile(path.join(directory, 'Test Video.final cut.mp4'), 'keep');

    await expect(
      provider().retrieve(request('merge-failure', { formatSpec: '137+140', formatIds: ['137', '140'] })),
    ).rejects.toMatchObject({ kind: 'fragment-unavailable' });

    expect((await fs.readdir(directory)).sort()).toEqual(['Other Video.mp4', 'Test Video.final cut.mp4']);
  });

  it('should settle a cancelled download only after the process exits and clean up after it', async () => {
    const marker = path.join(os.tmpdir(), `tubefetch-exit-${process.pid}-${Date.now()}`);
    process.env.FAKE_YTDLP_EXIT_MARKER = marker;
    const controller = new AbortController();

    try {
      const download = provider().retrieve(
        request('slow-exit', { signal: controller.signal, onProgress: () => controller.abort() }),
      );

      await expect(download).rejects.toMatchObject({ kind: 'cancelled', message: 'Download cancelled' });
      await expect(fs.stat(marker)).resolves.toBeDefined();
      expect(await fs.readdir(directory)).toEqual([]);
    } finally {
      await fs.rm(marker, { force: true });
    }
  });

  it('should kill a process that ignores termination after the grace period', async () => {
    const controller = new AbortController();

    const download = provider({ killGraceMs: 100 }).retrieve(
      request('ignore-term', { signal: controller.signal, onProgress: () => controller.abort() }),
    );

    await expect(download).rejects.toMatchObject({ kind: 'cancelled' });
  });

  it('should time out a stuck download as a transient failure', async () => {
    await expect(provider({ timeout: 200 }).retrieve(request('hang'))).rejects.toMatchObject({
      kind: 'transient-network',
      message: 'Download timeout',
    });
  });

  it('should name a missing executable', async () => {
    const missing = new YtDlpProvider({ binaryPath: path.join(directory, 'no-such-yt-dlp') });

    await expect(missing.retrieve(request('success'))).rejects.toThrow(
      `yt-dlp executable not found: ${path.join(directory, 'no-such-yt-dlp')}`,
    );
  });

  it('should report whether ffmpeg runs', async () => {
    process.env.FAKE_YTDLP_MODE = 'version';

    await expect(new YtDlpProvider({ ffmpegPath: SCRIPT }).checkMerger()).resolves.toBe(true);
    await expect(new YtDlpProvider({ ffmpegPath: path.join(directory, 'no-such-ffmpeg') }).checkMerger()).resolves.toBe(
      false,
    );
  });
});
