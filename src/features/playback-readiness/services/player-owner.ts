/**
 * Player Owner
 *
 * Owns at most one live playback session (player + event subscriptions +
 * callbacks). Starting a session always tears the previous one down first,
 * and every exit path goes through stop(), which releases the subscription
 * scope before anything else.
 */

import { createLogger } from '@/lib/logger';
import type { MediaPlayer, PlayerFactory, PlayerStatus, ValidatedHandle } from '../types';
import { PlaybackReadinessError, toPlaybackReadinessError } from '../utils/playback-errors';
import { createPacketPlayer } from './packet-player';

const logger = createLogger('PlayerOwner');

export interface PlayerSessionCallbacks {
  autoPlay?: boolean;
  onReady?: () => void;
  onFailure?: (error: PlaybackReadinessError) => void;
}

interface PlaybackSession {
  readonly player: MediaPlayer;
  readonly autoPlay: boolean;
  readonly releaseSubscriptions: () => void;
  settled: boolean;
  onReady: (() => void) | null;
  onFailure: ((error: PlaybackReadinessError) => void) | null;
}

export class PlayerOwner {
  private session: PlaybackSession | null = null;

  constructor(private readonly createPlayer: PlayerFactory = createPacketPlayer) {}

  get player(): MediaPlayer | null {
    return this.session?.player ?? null;
  }

  get hasSession(): boolean {
    return this.session !== null;
  }

  start(handle: ValidatedHandle, callbacks: PlayerSessionCallbacks = {}): void {
    this.stop();

    const player = this.createPlayer(handle);

    // Subscribe before publishing the session so no status change slips
    // between creation and observation.
    let session: PlaybackSession | null = null;
    let releaseSubscriptions: () => void;
    try {
      releaseSubscriptions = player.events.subscribe({
        statuschange: ({ detail }) => {
          if (session) this.handleStatus(session, detail.status, detail.error);
        },
        playbackerror: ({ detail }) => {
          if (session) this.handleFailure(session, detail.error);
        },
      });
    } catch (error) {
      player.release();
      throw error;
    }

    session = {
      player,
      autoPlay: callbacks.autoPlay ?? false,
      releaseSubscriptions,
      settled: false,
      onReady: callbacks.onReady ?? null,
      onFailure: callbacks.onFailure ?? null,
    };
    this.session = session;
    logger.debug('Session started', { path: handle.path, autoPlay: session.autoPlay });

    // A player may already be terminal by the time we observe it
    this.handleStatus(session, player.status, player.error);
  }

  /**
   * Tear down the current session. Safe to call with no session.
   */
  stop(): void {
    const session = this.session;
    if (!session) return;

    this.session = null;
    session.releaseSubscriptions();
    session.onReady = null;
    session.onFailure = null;
    session.player.pause();
    session.player.release();
    logger.debug('Session stopped');
  }

  private handleStatus(session: PlaybackSession, status: PlayerStatus, error: Error | null): void {
    if (status === 'ready') {
      this.handleReady(session);
    } else if (status === 'failed') {
      this.handleFailure(session, error ?? new PlaybackReadinessError('unknown'));
    }
  }

  private handleReady(session: PlaybackSession): void {
    if (this.session !== session || session.settled) return;
    const onReady = session.onReady;
    session.settled = true;
    session.onReady = null;
    logger.info('Player ready to play');
    if (session.autoPlay) {
      session.player.play();
    }
    onReady?.();
  }

  private handleFailure(session: PlaybackSession, error: Error): void {
    if (this.session !== session) return;
    const onFailure = session.onFailure;
    session.settled = true;
    session.onReady = null;
    session.onFailure = null;

    logger.error('Player failed:', error.message);
    onFailure?.(toPlaybackReadinessError(error));

    // The failure callback may already have replaced or stopped the session
    if (this.session === session) {
      this.stop();
    }
  }
}
