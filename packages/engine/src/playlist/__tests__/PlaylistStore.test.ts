/**
 * Tests for playlist file persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Playlist } from '../Playlist';
import { loadPlaylist, savePlaylist } from '../PlaylistStore';
import { StorageError, ValidationError } from '../../types';

describe('PlaylistStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cuedeck-playlist-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write pretty-printed JSON with a trailing newline', async () => {
    const file = join(dir, 'show.json');
    const playlist = new Playlist([
      { filePath: '/show/intro.wav', startTime: 0, endTime: 12, page: 3, comment: 'Walk-in', volume: 0.8 },
    ]);

    await savePlaylist(playlist, file);

    const content = await readFile(file, 'utf-8');
    expect(content).toBe(
      [
        '[',
        '  {',
        '    "file_path": "/show/intro.wav",',
        '    "start_time": 0,',
        '    "end_time": 12,',
        '    "page": 3,',
        '    "comment": "Walk-in",',
        '    "volume": 0.8',
        '  }',
        ']',
        '',
      ].join('\n')
    );
  });

  it('should load what it saved', async () => {
    const file = join(dir, 'show.json');
    const playlist = new Playlist([
      { filePath: '/show/a.wav', startTime: 1.5, endTime: 20, page: 1, comment: '', volume: 1 },
      { filePath: '/show/b.wav', startTime: 0, endTime: 8.25, page: 2, comment: 'Bows', volume: 0.5 },
    ]);

    await savePlaylist(playlist, file);
    const loaded = await loadPlaylist(file);

    expect(loaded.toArray()).toEqual(playlist.toArray());
    expect(loaded.currentIndex).toBe(-1);
  });

  it('should accept files that omit optional fields', async () => {
    const file = join(dir, 'minimal.json');
    await writeFile(file, '[{"file_path": "/show/a.wav", "start_time": 0, "end_time": 4}]');

    const loaded = await loadPlaylist(file);

    expect(loaded.at(0)).toEqual({
      filePath: '/show/a.wav',
      startTime: 0,
      endTime: 4,
      page: 0,
      comment: '',
      volume: 1,
    });
  });

  it('should report a missing file as a storage error', async () => {
    await expect(loadPlaylist(join(dir, 'missing.json'))).rejects.toThrow(StorageError);
  });

  it('should report malformed JSON as a validation error', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '[{"file_path": ');

    await expect(loadPlaylist(file)).rejects.toThrow(`Playlist file is not valid JSON: ${file}`);
  });

  it('should reject records with an invalid range', async () => {
    const file = join(dir, 'range.json');
    await writeFile(file, '[{"file_path": "/a.wav", "start_time": 5, "end_time": 2}]');

    await expect(loadPlaylist(file)).rejects.toThrow(ValidationError);
  });

  it('should report an unwritable path as a storage error', async () => {
    const file = join(dir, 'no-such-dir', 'show.json');

    await expect(savePlaylist(new Playlist(), file)).rejects.toThrow(StorageError);
  });
});
