/**
 * Packet Player - the default MediaPlayer
 *
 * Drives a validated video track without decoding it: readiness means the
 * first encoded packet could be read, and playback walks packets forward in
 * real time so position, end-of-stream and read faults behave like they do on
 * a real player. A rendering layer attaches through `events`.
 */

import { createLogger } from '@/lib/logger';
import type { MediaPacketInfo, MediaPlayer, PlayerStatus, ValidatedHandle } from '../types';
import { PlayerEmitter } from './player-emitter';

const logger = createLogger('PacketPlayer');

export class PacketPlayer implements MediaPlayer {
  readonly events = new PlayerEmitter();

  private _status: PlayerStatus = 'unknown';
  private _error: Error | null = null;
  private _isPlaying = false;
  private _currentTime = 0;
  private _playbackRate = 1;
  private _released = false;

  private packets: AsyncIterator<MediaPacketInfo> | null = null;
  // Incremented on pause/release so a running walk loop notices it is stale
  private walkGeneration = 0;
  private pacingTimer: ReturnType<typeof setTimeout> | null = null;
  private wakePacing: (() => void) | null = null;

  constructor(private readonly handle: ValidatedHandle) {
    this.prime().catch((error: unknown) => {
      logger.error('Unexpected error while priming:', error);
    });
  }

  get status(): PlayerStatus {
    return this._status;
  }

  get error(): Error | null {
    return this._error;
  }

  get isPlaying(): boolean {
    return this._isPlaying;
  }

  get currentTime(): number {
    return this._currentTime;
  }

  get playbackRate(): number {
    return this._playbackRate;
  }

  set playbackRate(value: number) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error('Playback rate must be a positive number');
    }
    this._playbackRate = value;
  }

  play(): void {
    if (this._released || this._status === 'failed' || this._isPlaying) return;
    this._isPlaying = true;
    this.events.dispatchPlay();
    if (this._status === 'ready') {
      this.startWalk();
    }
  }

  pause(): void {
    if (!this._isPlaying) return;
    this._isPlaying = false;
    this.stopWalk();
    this.events.dispatchPause();
  }

  release(): void {
    if (this._released) return;
    this._released = true;
    this._isPlaying = false;
    this.stopWalk();
    const packets = this.packets;
    this.packets = null;
    packets?.return?.().catch((error: unknown) => {
      logger.debug('Closing packet iterator failed', error);
    });
    this.handle.media.close();
    this.events.removeAllListeners();
  }

  private async prime(): Promise<void> {
    let first: MediaPacketInfo | null;
    try {
      first = await this.handle.track.readFirstPacket();
    } catch (error) {
      this.setFailed(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    if (this._released) return;
    if (!first) {
      this.setFailed(new Error(`Track ${this.handle.track.id} has no packets`));
      return;
    }

    this._currentTime = first.timestamp;
    this._status = 'ready';
    logger.debug('Ready', { path: this.handle.path, start: first.timestamp });
    this.events.dispatchStatusChange('ready', null);

    if (this._isPlaying) {
      this.startWalk();
    }
  }

  private setFailed(error: Error): void {
    if (this._released) return;
    this._status = 'failed';
    this._error = error;
    this._isPlaying = false;
    logger.warn('Failed to become ready', { path: this.handle.path, error: error.message });
    this.events.dispatchStatusChange('failed', error);
  }

  private startWalk(): void {
    const generation = ++this.walkGeneration;
    this.walk(generation).catch((error: unknown) => {
      logger.error('Packet walk crashed:', error);
    });
  }

  private stopWalk(): void {
    this.walkGeneration++;
    if (this.pacingTimer !== null) {
      clearTimeout(this.pacingTimer);
      this.pacingTimer = null;
    }
    const wake = this.wakePacing;
    this.wakePacing = null;
    wake?.();
  }

  private async walk(generation: number): Promise<void> {
    if (!this.packets) {
      this.packets = this.handle.track.readPackets();
    }
    const packets = this.packets;

    while (generation === this.walkGeneration) {
      let next: IteratorResult<MediaPacketInfo>;
      try {
        next = await packets.next();
      } catch (error) {
        if (generation !== this.walkGeneration) return;
        const fault = error instanceof Error ? error : new Error(String(error));
        logger.warn('Read fault during playback', { path: this.handle.path, error: fault.message });
        this._isPlaying = false;
        this.walkGeneration++;
        this.events.dispatchPlaybackError(fault);
        return;
      }

      if (generation !== this.walkGeneration) return;

      if (next.done) {
        this._isPlaying = false;
        this.walkGeneration++;
        this.packets = null;
        this.events.dispatchEnded();
        this.events.dispatchPause();
        return;
      }

      this._currentTime = next.value.timestamp;
      this.events.dispatchTimeUpdate(next.value.timestamp);
      await this.pace((next.value.duration * 1000) / this._playbackRate);
    }
  }

  private pace(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.wakePacing = resolve;
      this.pacingTimer = setTimeout(() => {
        this.pacingTimer = null;
        this.wakePacing = null;
        resolve();
      }, ms);
    });
  }
}

export function createPacketPlayer(handle: ValidatedHandle): MediaPlayer {
  return new PacketPlayer(handle);
}
