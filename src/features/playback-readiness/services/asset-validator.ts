/**
 * Asset Validator
 *
 * Decides whether a local media file can be handed to a player:
 * 1. the file exists
 * 2. the container is recognised
 * 3. the duration is finite and above the minimum
 * 4. there is at least one video track with a known codec
 *
 * Checks short-circuit on the first failure. Display geometry is computed for
 * downstream consumers but never fails validation. The opened media is closed
 * on every outcome except success, where it travels with the handle.
 */

import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import type { MediaProbe, ProbedMedia, ResourceLocator, ValidatedHandle } from '../types';
import { computeDisplaySize } from '../utils/display-geometry';
import { PlaybackReadinessError, toPlaybackReadinessError } from '../utils/playback-errors';
import { describeLocator, resolveLocatorPath } from '../utils/resource-locator';
import { createMediabunnyProbe } from './media-probe';

const logger = createLogger('AssetValidator');

export type ValidationResult =
  | { ok: true; handle: ValidatedHandle }
  | { ok: false; error: PlaybackReadinessError };

export interface ValidationTask {
  /** Stop the run. No result is delivered after this returns. */
  cancel(): void;
  readonly cancelled: boolean;
}

export interface AssetValidatorOptions {
  probe?: MediaProbe;
  minDurationSeconds?: number;
}

function fail(kind: PlaybackReadinessError['kind'], detail: string): ValidationResult {
  return { ok: false, error: new PlaybackReadinessError(kind, detail) };
}

export class AssetValidator {
  private readonly probe: MediaProbe;
  private readonly minDurationSeconds: number;

  constructor(options: AssetValidatorOptions = {}) {
    this.probe = options.probe ?? createMediabunnyProbe();
    this.minDurationSeconds = options.minDurationSeconds ?? config.playback.minDurationSeconds;
  }

  /**
   * Validate a locator.
   *
   * Resolves with a result for every outcome, including unexpected probe
   * errors (as `unknown`). Rejects only when `signal` aborts, with the
   * signal's reason.
   */
  async validate(locator: ResourceLocator, signal?: AbortSignal): Promise<ValidationResult> {
    signal?.throwIfAborted();
    const label = describeLocator(locator);

    const path = resolveLocatorPath(locator);
    if (!path) {
      return fail('missing-resource', `Not a local file: ${label}`);
    }

    let media: ProbedMedia | null = null;
    let handedOff = false;
    try {
      const exists = await this.probe.exists(path);
      signal?.throwIfAborted();
      if (!exists) {
        return fail('missing-resource', `File not found: ${path}`);
      }

      media = this.probe.open(path);

      const playable = await media.isPlayable();
      signal?.throwIfAborted();
      if (!playable) {
        return fail('not-playable', `Unrecognised container: ${path}`);
      }

      const duration = await media.computeDuration();
      signal?.throwIfAborted();
      if (!Number.isFinite(duration) || duration <= this.minDurationSeconds) {
        return fail('bad-duration', `Duration ${duration}s is not usable: ${path}`);
      }

      const tracks = await media.getVideoTracks();
      signal?.throwIfAborted();
      const track = tracks.find((t) => t.codec !== null);
      if (!track) {
        return fail('no-tracks', `No decodable video track (${tracks.length} video tracks): ${path}`);
      }

      const displaySize = computeDisplaySize(track.codedWidth, track.codedHeight, track.rotation);

      logger.debug('Validated', { path, duration, codec: track.codec, displaySize });

      const handle: ValidatedHandle = Object.freeze({
        locator,
        path,
        duration,
        track,
        displaySize: Object.freeze(displaySize),
        media,
      });
      handedOff = true;
      return { ok: true, handle };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn('Probe failed', { path, error });
      return { ok: false, error: toPlaybackReadinessError(error) };
    } finally {
      // On success the handle owns the media
      if (!handedOff) {
        media?.close();
      }
    }
  }

  /**
   * Run validation in the background.
   *
   * `onComplete` is called exactly once with the result, unless the task is
   * cancelled first; a cancelled run is silent.
   */
  start(locator: ResourceLocator, onComplete: (result: ValidationResult) => void): ValidationTask {
    const controller = new AbortController();

    this.validate(locator, controller.signal).then(
      (result) => {
        if (!controller.signal.aborted) {
          onComplete(result);
        } else if (result.ok) {
          result.handle.media.close();
        }
      },
      (error: unknown) => {
        if (controller.signal.aborted) {
          logger.debug('Validation cancelled', { locator: describeLocator(locator) });
          return;
        }
        onComplete({ ok: false, error: toPlaybackReadinessError(error) });
      }
    ).catch((error: unknown) => {
      logger.error('Validation result handler threw:', error);
    });

    return {
      cancel: () => controller.abort(),
      get cancelled() {
        return controller.signal.aborted;
      },
    };
  }
}
