/**
 * Playback Coordinator
 *
 * Turns a locator into a ready player, or a failure, within a deadline:
 *
 *   prepare() ─┬─ arm watchdog ──────────────┐
 *              └─ validate ─── ok ─ owner ───┼─ first terminal event wins
 *                               └── fail ────┘
 *
 * Each prepare() is an attempt. Events are acted on only while their attempt
 * is the active one; teardown() and the next prepare() retire it, which
 * silences everything still in flight for it.
 */

import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { clampPositive } from '@/utils/math-guards';
import { createReadinessStore, type ReadinessStore } from '../stores/readiness-store';
import type { LoadState, MediaPlayer, PlayerFactory, ResourceLocator, ValidatedHandle } from '../types';
import { PlaybackReadinessError, toPlaybackReadinessError } from '../utils/playback-errors';
import { describeLocator } from '../utils/resource-locator';
import { AssetValidator, type ValidationResult, type ValidationTask } from './asset-validator';
import { LoadWatchdog } from './load-watchdog';
import { PlayerOwner } from './player-owner';

const logger = createLogger('PlaybackCoordinator');

export interface PrepareOptions {
  autoPlay?: boolean;
  /** Deadline in milliseconds; defaults to PLAYBACK_READY_TIMEOUT_MS */
  timeoutMs?: number;
  onReady?: () => void;
  /**
   * Failures before readiness only. Faults after `onReady` go to
   * `onPlaybackError`; pass both to hear about every failure.
   */
  onFailure?: (error: PlaybackReadinessError) => void;
  /** Faults after readiness (stalls, read errors while playing) */
  onPlaybackError?: (error: PlaybackReadinessError) => void;
}

export interface PlaybackCoordinatorDeps {
  validator?: AssetValidator;
  watchdog?: LoadWatchdog;
  owner?: PlayerOwner;
  /** Used only when no owner is given */
  createPlayer?: PlayerFactory;
  defaultTimeoutMs?: number;
}

interface Attempt {
  readonly id: number;
  readonly options: PrepareOptions;
  validation: ValidationTask | null;
  ready: boolean;
}

export class PlaybackCoordinator {
  readonly store: ReadinessStore = createReadinessStore();

  private readonly validator: AssetValidator;
  private readonly watchdog: LoadWatchdog;
  private readonly owner: PlayerOwner;
  private readonly defaultTimeoutMs: number;

  private active: Attempt | null = null;
  private attemptCounter = 0;

  constructor(deps: PlaybackCoordinatorDeps = {}) {
    this.validator = deps.validator ?? new AssetValidator();
    this.watchdog = deps.watchdog ?? new LoadWatchdog();
    this.owner = deps.owner ?? new PlayerOwner(deps.createPlayer);
    this.defaultTimeoutMs = deps.defaultTimeoutMs ?? config.playback.readyTimeoutMs;
  }

  get state(): LoadState {
    return this.store.getState().loadState;
  }

  get player(): MediaPlayer | null {
    return this.store.getState().player;
  }

  /**
   * Start loading `locator`. Returns immediately; the outcome arrives through
   * the store and the callbacks, never synchronously.
   */
  prepare(locator: ResourceLocator, options: PrepareOptions = {}): void {
    this.teardown();

    const attempt: Attempt = {
      id: ++this.attemptCounter,
      options,
      validation: null,
      ready: false,
    };
    this.active = attempt;

    const timeoutMs = clampPositive(options.timeoutMs ?? this.defaultTimeoutMs, 1);
    logger.debug(`Attempt ${attempt.id}: preparing ${describeLocator(locator)}`, { timeoutMs });
    this.store.getState().beginLoading(locator);

    this.watchdog.start(timeoutMs, () => this.handleTimeout(attempt));
    attempt.validation = this.validator.start(locator, (result) => this.handleValidation(attempt, result));
  }

  /**
   * Abandon the current attempt and release everything it holds.
   * Idempotent.
   */
  teardown(): void {
    const attempt = this.active;
    this.active = null;

    this.watchdog.cancel();
    attempt?.validation?.cancel();
    this.owner.stop();

    if (attempt) {
      logger.debug(`Attempt ${attempt.id}: torn down`);
    }
    if (this.store.getState().loadState.status !== 'idle') {
      this.store.getState().reset();
    }
  }

  private handleTimeout(attempt: Attempt): void {
    if (this.active !== attempt) return;
    attempt.validation?.cancel();
    this.fail(attempt, new PlaybackReadinessError('timeout'));
  }

  private handleValidation(attempt: Attempt, result: ValidationResult): void {
    if (this.active !== attempt) {
      if (result.ok) result.handle.media.close();
      return;
    }
    this.watchdog.cancel();
    attempt.validation = null;

    if (!result.ok) {
      this.fail(attempt, result.error);
      return;
    }

    this.attach(attempt, result.handle);
  }

  private attach(attempt: Attempt, handle: ValidatedHandle): void {
    try {
      this.owner.start(handle, {
        autoPlay: attempt.options.autoPlay ?? false,
        onReady: () => this.handleReady(attempt, handle),
        onFailure: (error) => {
          if (attempt.ready) {
            this.handlePlaybackFault(attempt, error);
          } else {
            this.fail(attempt, error);
          }
        },
      });
    } catch (error) {
      if (attempt.ready) {
        logger.error(`Attempt ${attempt.id}: onReady handler threw:`, error);
        return;
      }
      // No player took the handle
      handle.media.close();
      this.fail(attempt, toPlaybackReadinessError(error));
    }
  }

  private handleReady(attempt: Attempt, handle: ValidatedHandle): void {
    if (this.active !== attempt) return;
    const player = this.owner.player;
    if (!player) return;

    attempt.ready = true;
    this.store.getState().markReady(player, handle);
    logger.info(`Attempt ${attempt.id}: ready`, { path: handle.path });
    attempt.options.onReady?.();
  }

  private handlePlaybackFault(attempt: Attempt, error: PlaybackReadinessError): void {
    if (this.active !== attempt) return;
    this.active = null;
    this.owner.stop();
    this.store.getState().markFailed(error);
    logger.warn(`Attempt ${attempt.id}: playback fault`, { message: error.message });
    attempt.options.onPlaybackError?.(error);
  }

  private fail(attempt: Attempt, error: PlaybackReadinessError): void {
    if (this.active !== attempt) return;
    this.active = null;

    this.watchdog.cancel();
    attempt.validation?.cancel();
    attempt.validation = null;
    this.owner.stop();

    this.store.getState().markFailed(error);
    logger.warn(`Attempt ${attempt.id}: failed (${error.kind})`, { message: error.message });
    attempt.options.onFailure?.(error);
  }
}
