/**
 * Playback module exports
 */

export { PlaybackEngine } from './PlaybackEngine';
export { FadeController, NATURAL_FADE, HALT_FADE } from './FadeController';
export type { FadeControllerOptions } from './FadeController';
export { Scheduler } from './Scheduler';
export { currentPosition } from './clock';
