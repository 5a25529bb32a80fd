import type { Size } from '@/utils/math-guards';
import type { PlayerEmitter } from './services/player-emitter';

/** A local media file: a filesystem path or a `file:` URL */
export type ResourceLocator = string | URL;

export type ValidationErrorKind =
  | 'missing-resource'
  | 'not-playable'
  | 'no-tracks'
  | 'bad-duration'
  | 'timeout';

export type PlaybackErrorKind = ValidationErrorKind | 'unknown';

export interface DisplaySize extends Size {
  aspectRatio: number;
}

// ============================================================================
// Media probe port
// ============================================================================

export interface MediaPacketInfo {
  /** Presentation timestamp in seconds */
  timestamp: number;
  /** Duration in seconds (0 when the container does not say) */
  duration: number;
}

export interface ProbedVideoTrack {
  readonly id: number;
  /** Codec identifier, or null when the container's codec is not recognised */
  readonly codec: string | null;
  readonly codedWidth: number;
  readonly codedHeight: number;
  /** Clockwise rotation in degrees from the container's track matrix */
  readonly rotation: number;
  readFirstPacket(): Promise<MediaPacketInfo | null>;
  readPackets(): AsyncIterator<MediaPacketInfo>;
}

export interface ProbedMedia {
  isPlayable(): Promise<boolean>;
  computeDuration(): Promise<number>;
  getVideoTracks(): Promise<ProbedVideoTrack[]>;
  /** Release the underlying file. Idempotent; later reads fail. */
  close(): void;
}

export interface MediaProbe {
  exists(path: string): Promise<boolean>;
  open(path: string): ProbedMedia;
}

// ============================================================================
// Validation
// ============================================================================

export interface ValidatedHandle {
  readonly locator: ResourceLocator;
  readonly path: string;
  readonly duration: number;
  readonly track: ProbedVideoTrack;
  readonly displaySize: Readonly<DisplaySize>;
  /** Open media the track reads from; the player that takes the handle closes it */
  readonly media: ProbedMedia;
}

// ============================================================================
// Player port
// ============================================================================

export type PlayerStatus = 'unknown' | 'ready' | 'failed';

export interface MediaPlayer {
  readonly status: PlayerStatus;
  /** Set once status is 'failed' */
  readonly error: Error | null;
  readonly isPlaying: boolean;
  readonly currentTime: number;
  playbackRate: number;
  readonly events: PlayerEmitter;
  play(): void;
  pause(): void;
  /** Stop all work and drop listeners. Safe to call more than once. */
  release(): void;
}

export type PlayerFactory = (handle: ValidatedHandle) => MediaPlayer;

// ============================================================================
// Published state
// ============================================================================

export type LoadState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'ready' }
  | { status: 'failed'; reason: PlaybackErrorKind; message: string };

export type LoadStatus = LoadState['status'];
