/**
 * Playlist module exports
 */

export {
  Playlist,
  VOLUME_PRESETS,
  songDuration,
  songFilename,
  songFromRecord,
  songToRecord,
} from './Playlist';
export { savePlaylist, loadPlaylist } from './PlaylistStore';
