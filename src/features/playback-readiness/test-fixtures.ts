/**
 * In-process stand-ins for the media probe and player ports.
 * Shared by the playback-readiness tests; nothing here touches real files.
 */

import path from 'path';
import { PlayerEmitter } from './services/player-emitter';
import type {
  MediaPacketInfo,
  MediaPlayer,
  MediaProbe,
  PlayerFactory,
  PlayerStatus,
  ProbedMedia,
  ProbedVideoTrack,
  ValidatedHandle,
} from './types';

export interface FakeTrackSpec {
  id?: number;
  codec?: string | null;
  codedWidth?: number;
  codedHeight?: number;
  rotation?: number;
  packets?: MediaPacketInfo[];
  /** Thrown by the packet reader instead of yielding the packet at this index */
  failAtPacket?: number;
}

export interface FakeMediaSpec {
  exists?: boolean;
  playable?: boolean;
  duration?: number;
  tracks?: FakeTrackSpec[];
  /** Delay before the existence check answers, on the timer queue */
  delayMs?: number;
  /** Thrown by computeDuration() */
  probeError?: Error;
}

export const VALID_CLIP: FakeMediaSpec = {
  exists: true,
  playable: true,
  duration: 5,
  tracks: [{ codec: 'avc', codedWidth: 1920, codedHeight: 1080 }],
};

export function fakeTrack(spec: FakeTrackSpec = {}): ProbedVideoTrack {
  const packets = spec.packets ?? [
    { timestamp: 0, duration: 0 },
    { timestamp: 1, duration: 0 },
  ];

  return {
    id: spec.id ?? 1,
    codec: spec.codec === undefined ? 'avc' : spec.codec,
    codedWidth: spec.codedWidth ?? 1280,
    codedHeight: spec.codedHeight ?? 720,
    rotation: spec.rotation ?? 0,
    async readFirstPacket() {
      if (spec.failAtPacket === 0) {
        throw new Error('corrupt first packet');
      }
      return packets[0] ?? null;
    },
    readPackets() {
      return (async function* () {
        for (let i = 0; i < packets.length; i++) {
          if (spec.failAtPacket === i) {
            throw new Error(`corrupt packet ${i}`);
          }
          yield packets[i];
        }
      })();
    },
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Probe over an in-memory library keyed by absolute path. Paths missing from
 * the library do not exist.
 */
export function createFakeProbe(
  library: Record<string, FakeMediaSpec>
): MediaProbe & { opened: string[]; closed: string[] } {
  const byPath = new Map(Object.entries(library).map(([key, spec]) => [path.resolve(key), spec]));
  const opened: string[] = [];
  const closed: string[] = [];

  return {
    opened,
    closed,
    async exists(filePath) {
      const spec = byPath.get(filePath);
      if (spec?.delayMs) {
        await delay(spec.delayMs);
      }
      return spec !== undefined && spec.exists !== false;
    },
    open(filePath): ProbedMedia {
      opened.push(filePath);
      const spec = byPath.get(filePath) ?? {};
      let isClosed = false;
      return {
        close() {
          if (isClosed) return;
          isClosed = true;
          closed.push(filePath);
        },
        async isPlayable() {
          return spec.playable ?? true;
        },
        async computeDuration() {
          if (spec.probeError) throw spec.probeError;
          return spec.duration ?? 5;
        },
        async getVideoTracks() {
          return (spec.tracks ?? []).map((track) => fakeTrack(track));
        },
      };
    },
  };
}

/**
 * Open media that only records whether it was closed.
 */
export function fakeMedia(): ProbedMedia & { closeCalls: number } {
  return {
    closeCalls: 0,
    async isPlayable() {
      return true;
    },
    async computeDuration() {
      return 5;
    },
    async getVideoTracks() {
      return [fakeTrack()];
    },
    close() {
      this.closeCalls++;
    },
  };
}

export function fakeHandle(overrides: Partial<ValidatedHandle> = {}): ValidatedHandle {
  return {
    locator: '/media/clip.mp4',
    path: '/media/clip.mp4',
    duration: 5,
    track: fakeTrack(),
    displaySize: { width: 1280, height: 720, aspectRatio: 1280 / 720 },
    media: fakeMedia(),
    ...overrides,
  };
}

/**
 * Player whose lifecycle is driven by the test.
 */
export class FakePlayer implements MediaPlayer {
  readonly events = new PlayerEmitter();
  status: PlayerStatus = 'unknown';
  error: Error | null = null;
  isPlaying = false;
  currentTime = 0;
  playbackRate = 1;
  released = false;
  playCalls = 0;

  constructor(readonly handle: ValidatedHandle) {}

  play(): void {
    this.playCalls++;
    this.isPlaying = true;
  }

  pause(): void {
    this.isPlaying = false;
  }

  release(): void {
    this.released = true;
    this.handle.media.close();
  }

  becomeReady(): void {
    this.status = 'ready';
    this.events.dispatchStatusChange('ready', null);
  }

  failWith(error: Error): void {
    this.status = 'failed';
    this.error = error;
    this.events.dispatchStatusChange('failed', error);
  }

  faultDuringPlayback(error: Error): void {
    this.events.dispatchPlaybackError(error);
  }
}

export function createFakePlayerFactory(
  onCreate?: (player: FakePlayer) => void
): PlayerFactory & { players: FakePlayer[] } {
  const players: FakePlayer[] = [];
  const factory = (handle: ValidatedHandle) => {
    const player = new FakePlayer(handle);
    players.push(player);
    onCreate?.(player);
    return player;
  };
  return Object.assign(factory, { players });
}
