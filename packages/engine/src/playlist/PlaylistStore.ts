/**
 * JSON file persistence for playlists
 *
 * A playlist file is a JSON array of song records, pretty-printed with a
 * two-space indent.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { StorageError, ValidationError } from '../types';
import { EngineLogger } from '../utils/logger';
import { Playlist } from './Playlist';

const logger = EngineLogger.child('PlaylistStore');

/**
 * @throws StorageError if the file cannot be written
 */
export async function savePlaylist(playlist: Playlist, filePath: string): Promise<void> {
  const content = `${JSON.stringify(playlist.toJSON(), null, 2)}\n`;

  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    logger.error('Failed to save playlist', { filePath, error });
    throw new StorageError(`Could not save playlist to ${filePath}`, error, { filePath });
  }

  logger.info('Playlist saved', { filePath, songs: playlist.length });
}

/**
 * @throws StorageError if the file cannot be read
 * @throws ValidationError if it is not valid playlist JSON
 */
export async function loadPlaylist(filePath: string): Promise<Playlist> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    logger.error('Failed to read playlist', { filePath, error });
    throw new StorageError(`Could not read playlist from ${filePath}`, error, { filePath });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Playlist file is not valid JSON: ${filePath}`, error, { filePath });
  }

  const playlist = Playlist.fromJSON(data);
  logger.info('Playlist loaded', { filePath, songs: playlist.length });
  return playlist;
}
