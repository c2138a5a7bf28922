/**
 * In-memory audio device for tests
 */

import type { AudioBackend } from '../types';

export class FakeBackend implements AudioBackend {
  loadedFile: string | null = null;
  playing = false;
  paused = false;
  volume = 1;
  volumeWrites: number[] = [];
  calls: string[] = [];

  failingFiles = new Set<string>();
  failPlay = false;
  /** Forces isBusy() to report this value */
  busyOverride: boolean | null = null;

  load(filePath: string): void {
    this.calls.push(`load:${filePath}`);
    if (this.failingFiles.has(filePath)) {
      throw new Error(`Unsupported format: ${filePath}`);
    }
    this.loadedFile = filePath;
  }

  play(startOffset: number): void {
    this.calls.push(`play:${startOffset}`);
    if (this.failPlay) {
      throw new Error('Device busy');
    }
    this.playing = true;
    this.paused = false;
  }

  pause(): void {
    this.calls.push('pause');
    this.paused = true;
  }

  resume(): void {
    this.calls.push('resume');
    this.paused = false;
  }

  stop(): void {
    this.calls.push('stop');
    this.playing = false;
    this.paused = false;
  }

  setVolume(volume: number): void {
    this.volume = volume;
    this.volumeWrites.push(volume);
  }

  isBusy(): boolean {
    return this.busyOverride ?? (this.playing && !this.paused);
  }
}
