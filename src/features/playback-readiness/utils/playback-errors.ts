import type { PlaybackErrorKind } from '../types';

const MESSAGES: Record<Exclude<PlaybackErrorKind, 'unknown'>, string> = {
  'missing-resource': 'resource not found',
  'not-playable': 'not playable on this device',
  'no-tracks': 'no playable tracks',
  'bad-duration': 'invalid duration',
  timeout: 'did not become ready before the deadline',
};

/**
 * Error carried into a failed load state.
 *
 * `unknown` wraps an underlying platform or library error; its message is the
 * original error's message and the original is kept as `cause`.
 */
export class PlaybackReadinessError extends Error {
  constructor(
    public readonly kind: PlaybackErrorKind,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? (kind === 'unknown' ? 'unknown playback error' : MESSAGES[kind]), options);
    this.name = 'PlaybackReadinessError';
  }
}

export function toPlaybackReadinessError(error: unknown): PlaybackReadinessError {
  if (error instanceof PlaybackReadinessError) {
    return error;
  }
  if (error instanceof Error) {
    return new PlaybackReadinessError('unknown', error.message, { cause: error });
  }
  return new PlaybackReadinessError('unknown', String(error), { cause: error });
}

/** User-facing text for a failure */
export function describePlaybackError(error: PlaybackReadinessError): string {
  return error.kind === 'unknown' ? error.message : MESSAGES[error.kind];
}
