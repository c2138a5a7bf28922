/**
 * Command handler: AdvanceSong
 * Moves the controller's playlist on to the next song and plays it
 */

import type { CueDeckClient } from '@cuedeck/engine';
import type { CommandHandler } from '../types/index.js';

export const ADVANCE_SONG_COMMAND = 'AdvanceSong';

export function createAdvanceSongHandler(
  controller: Pick<CueDeckClient, 'advanceSong'>
): CommandHandler {
  return () => {
    controller.advanceSong();
  };
}
