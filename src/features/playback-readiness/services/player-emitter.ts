import { createLogger } from '@/lib/logger';
import type { PlayerStatus } from '../types';

const logger = createLogger('PlayerEmitter');

type StatusChangePayload = { status: PlayerStatus; error: Error | null };
type PlaybackErrorPayload = { error: Error };
type TimeUpdatePayload = { time: number };

export type PlayerStateEventMap = {
  statuschange: StatusChangePayload;
  playbackerror: PlaybackErrorPayload;
  timeupdate: TimeUpdatePayload;
  play: undefined;
  pause: undefined;
  ended: undefined;
};

export type PlayerEventTypes = keyof PlayerStateEventMap;

export type CallbackListener<T extends PlayerEventTypes> = (data: {
  detail: PlayerStateEventMap[T];
}) => void;

type PlayerListeners = {
  [EventType in PlayerEventTypes]: CallbackListener<EventType>[];
};

export type PlayerListenerSet = {
  [EventType in PlayerEventTypes]?: CallbackListener<EventType>;
};

export class PlayerEmitter {
  private listeners: PlayerListeners = {
    statuschange: [],
    playbackerror: [],
    timeupdate: [],
    play: [],
    pause: [],
    ended: [],
  };

  addEventListener<Q extends PlayerEventTypes>(name: Q, callback: CallbackListener<Q>): void {
    this.listeners[name].push(callback);
  }

  removeEventListener<Q extends PlayerEventTypes>(name: Q, callback: CallbackListener<Q>): void {
    const remaining: CallbackListener<Q>[] = this.listeners[name].filter((l) => l !== callback);
    this.setListeners(name, remaining);
  }

  /**
   * Attach several listeners at once. The returned function detaches exactly
   * those listeners and is safe to call more than once.
   */
  subscribe(handlers: PlayerListenerSet): () => void {
    const detachers: Array<() => void> = [];
    const attach = <Q extends PlayerEventTypes>(name: Q, callback: CallbackListener<Q> | undefined) => {
      if (!callback) return;
      this.addEventListener(name, callback);
      detachers.push(() => this.removeEventListener(name, callback));
    };

    attach('statuschange', handlers.statuschange);
    attach('playbackerror', handlers.playbackerror);
    attach('timeupdate', handlers.timeupdate);
    attach('play', handlers.play);
    attach('pause', handlers.pause);
    attach('ended', handlers.ended);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const detach of detachers) {
        detach();
      }
    };
  }

  hasListeners(name: PlayerEventTypes): boolean {
    return this.listeners[name].length > 0;
  }

  listenerCount(name: PlayerEventTypes): number {
    return this.listeners[name].length;
  }

  removeAllListeners(): void {
    this.listeners = {
      statuschange: [],
      playbackerror: [],
      timeupdate: [],
      play: [],
      pause: [],
      ended: [],
    };
  }

  dispatchStatusChange(status: PlayerStatus, error: Error | null): void {
    this.dispatchEvent('statuschange', { status, error });
  }

  dispatchPlaybackError(error: Error): void {
    this.dispatchEvent('playbackerror', { error });
  }

  dispatchTimeUpdate(time: number): void {
    this.dispatchEvent('timeupdate', { time });
  }

  dispatchPlay(): void {
    this.dispatchEvent('play', undefined);
  }

  dispatchPause(): void {
    this.dispatchEvent('pause', undefined);
  }

  dispatchEnded(): void {
    this.dispatchEvent('ended', undefined);
  }

  private setListeners<Q extends PlayerEventTypes>(name: Q, callbacks: CallbackListener<Q>[]): void {
    const next: PlayerListeners = { ...this.listeners };
    next[name] = callbacks;
    this.listeners = next;
  }

  private dispatchEvent<T extends PlayerEventTypes>(
    eventName: T,
    payload: PlayerStateEventMap[T]
  ): void {
    // Snapshot so listeners that detach during dispatch don't skip siblings
    const callbacks: CallbackListener<T>[] = [...this.listeners[eventName]];
    for (const callback of callbacks) {
      try {
        callback({ detail: payload });
      } catch (error) {
        logger.error(`Error in event listener for ${eventName}:`, error);
      }
    }
  }
}
