import fs from 'node:fs';
import path from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import { listCompletedFiles, resolveCompletedFile } from '../core/completedFiles.js';
import { tempDir } from './helpers.js';

const OLDER = new Date('2024-01-02T03:04:05.000Z');
const NEWER = new Date('2024-02-03T04:05:06.000Z');

describe('completed files', () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
    fs.writeFileSync(path.join(dir, 'older.mp4'), 'abcd');
    fs.utimesSync(path.join(dir, 'older.mp4'), OLDER, OLDER);
    fs.writeFileSync(path.join(dir, 'newer.mp3'), 'ab');
    fs.utimesSync(path.join(dir, 'newer.mp3'), NEWER, NEWER);
    fs.writeFileSync(path.join(dir, '.DS_Store'), 'x');
    fs.mkdirSync(path.join(dir, 'nested'));
  });

  it('should list regular files newest first', async () => {
    expect(await listCompletedFiles(dir, 50)).toEqual([
      { filename: 'newer.mp3', size: 2, modified: '2024-02-03T04:05:06.000Z' },
      { filename: 'older.mp4', size: 4, modified: '2024-01-02T03:04:05.000Z' },
    ]);
  });

  it('should leave out files that are still being written', async () => {
    for (const name of ['clip.mp4.part', 'clip.mp4.ytdl', 'clip.f137.mp4.temp']) {
      fs.writeFileSync(path.join(dir, name), 'partial');
    }
    expect((await listCompletedFiles(dir, 50)).map((f) => f.filename)).toEqual(['newer.mp3', 'older.mp4']);
  });

  it('should cap the listing', async () => {
    expect((await listCompletedFiles(dir, 1)).map((f) => f.filename)).toEqual(['newer.mp3']);
  });

  it('should treat a missing directory as empty', async () => {
    expect(await listCompletedFiles(path.join(dir, 'absent'), 50)).toEqual([]);
  });

  it('should resolve existing files inside the directory', async () => {
    expect(await resolveCompletedFile(dir, 'older.mp4')).toBe(path.resolve(dir, 'older.mp4'));
  });

  it.each(['', '.', '..', '../older.mp4', 'nested/older.mp4', 'a\\b', '.DS_Store', 'bad\0name'])(
    'should refuse the unsafe name %j',
    async (name) => {
      expect(await resolveCompletedFile(dir, name)).toBeNull();
    },
  );

  it('should refuse directories and missing files', async () => {
    expect(await resolveCompletedFile(dir, 'nested')).toBeNull();
    expect(await resolveCompletedFile(dir, 'missing.mp4')).toBeNull();
  });
});
