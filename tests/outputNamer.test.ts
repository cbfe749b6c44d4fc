import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import fc from 'fast-check';
import { OutputNamer, sanitizeTitle, truncateBytes } from '../src/download/naming/OutputNamer';
import { LinkEntry } from '../src/types';

function link(id: string): LinkEntry {
  return { rawInput: id, canonicalId: id, url: `https://www.youtube.com/watch?v=${id}`, isValid: true };
}

describe('OutputNamer', () => {
  let outputDirectory: string;

  beforeEach(async () => {
    outputDirectory = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'tubefetch-names-')), 'output');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(outputDirectory), { recursive: true, force: true });
  });

  describe('sanitizeTitle', () => {
    it('should replace characters that are illegal in paths', () => {
      expect(sanitizeTitle('AC/DC: Live? <Part 1>')).toBe('AC_DC_ Live_ _Part 1_');
      expect(sanitizeTitle('a\\b|c*d"e')).toBe('a_b_c_d_e');
    });

    it('should collapse whitespace and underscores', () => {
      expect(sanitizeTitle('  Test    Video  ')).toBe('Test Video');
      expect(sanitizeTitle('Test\tVideo')).toBe('Test_Video');
      expect(sanitizeTitle('a???b')).toBe('a_b');
    });

    it('should strip leading and trailing dots', () => {
      expect(sanitizeTitle('...hidden...')).toBe('hidden');
    });

    it('should prefix reserved device names', () => {
      expect(sanitizeTitle('CON')).toBe('_CON');
      expect(sanitizeTitle('com1.txt')).toBe('_com1.txt');
    });

    it('should truncate to the byte budget', () => {
      expect(sanitizeTitle('a'.repeat(300))).toBe('a'.repeat(200));
      expect(sanitizeTitle('abc def', 4)).toBe('abc');
    });
  });

  describe('truncateBytes', () => {
    it('should never split a multi-byte character', () => {
      expect(truncateBytes('ééé', 5)).toBe('éé');
      expect(truncateBytes('日本語', 4)).toBe('日');
    });

    it('Property: output fits the budget and is a prefix', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), fc.integer({ min: 0, max: 64 }), (value, maxBytes) => {
          const truncated = truncateBytes(value, maxBytes);
          expect(Buffer.byteLength(truncated, 'utf8')).toBeLessThanOrEqual(maxBytes);
          expect(value.startsWith(truncated)).toBe(true);
        }),
        { numRuns: 100 },
      );
    });
  });

  describe('nameFor', () => {
    it('should disambiguate identical titles within a run', () => {
      const namer = new OutputNamer({ outputDirectory });

      const first = namer.nameFor(link('aaaaaaaaaaa'), { title: 'Test Video' });
      const second = namer.nameFor(link('bbbbbbbbbbb'), { title: 'Test Video' });
      const third = namer.nameFor(link('ccccccccccc'), { title: 'Test Video' });

      expect(first).toBe(path.join(outputDirectory, 'Test Video.mp4'));
      expect(second).toBe(path.join(outputDirectory, 'Test Video (1).mp4'));
      expect(third).toBe(path.join(outputDirectory, 'Test Video (2).mp4'));
      expect(namer.isClaimed(second)).toBe(true);
    });

    it('should skip names that already exist on disk', async () => {
      const namer = new OutputNamer({ outputDirectory });
      await namer.prepare();
      await fs.writeFile(path.join(outputDirectory, 'Test Video.mp4'), 'existing');

      expect(namer.nameFor(link('aaaaaaaaaaa'), { title: 'Test Video' })).toBe(
        path.join(outputDirectory, 'Test Video (1).mp4'),
      );
    });

    it('should fall back to the video ID when the title is empty', () => {
      const namer = new OutputNamer({ outputDirectory });

      expect(namer.nameFor(link('aaaaaaaaaaa'), { title: '???' })).toBe(path.join(outputDirectory, '_.mp4'));
      expect(namer.nameFor(link('bbbbbbbbbbb'), { title: '...' })).toBe(
        path.join(outputDirectory, 'bbbbbbbbbbb.mp4'),
      );
      expect(namer.nameFor(link('ccccccccccc'))).toBe(path.join(outputDirectory, 'ccccccccccc.mp4'));
    });

    it('should honor a custom extension', () => {
      const namer = new OutputNamer({ outputDirectory, extension: 'mkv' });

      expect(namer.nameFor(link('aaaaaaaaaaa'), { title: 'Clip' })).toBe(path.join(outputDirectory, 'Clip.mkv'));
      expect(namer.nameFor(link('bbbbbbbbbbb'), { title: 'Clip', extension: '.webm' })).toBe(
        path.join(outputDirectory, 'Clip.webm'),
      );
    });

    it('Property: never returns the same path twice', () => {
      fc.assert(
        fc.property(fc.array(fc.constantFrom('Test Video', 'Other', 'a/b', ''), { maxLength: 20 }), (titles) => {
          const namer = new OutputNamer({ outputDirectory });
          const paths = titles.map((title, i) => namer.nameFor(link(`id${String(i).padStart(9, '0')}`), { title }));

          expect(new Set(paths).size).toBe(paths.length);
        }),
        { numRuns: 50 },
      );
    });
  });

  describe('prepare', () => {
    it('should create the directory and tolerate an existing one', async () => {
      const namer = new OutputNamer({ outputDirectory });

      await expect(namer.prepare()).resolves.toBe(outputDirectory);
      await expect(namer.prepare()).resolves.toBe(outputDirectory);
      expect((await fs.stat(outputDirectory)).isDirectory()).toBe(true);
    });
  });
});
