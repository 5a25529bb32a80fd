/**
 * Media Probe - reads container facts from local files using mediabunny
 *
 * Only demuxing happens here: format detection, duration, track layout and
 * encoded packets. Nothing is decoded.
 */

import { stat } from 'fs/promises';
import type { EncodedPacket, Input, InputVideoTrack } from 'mediabunny';
import { createLogger } from '@/lib/logger';
import type { MediaPacketInfo, MediaProbe, ProbedMedia, ProbedVideoTrack } from '../types';

const logger = createLogger('MediaProbe');

type MediabunnyModule = typeof import('mediabunny');

// Lazy load mediabunny
let mediabunnyModule: Promise<MediabunnyModule> | null = null;
function getMediabunny(): Promise<MediabunnyModule> {
  if (!mediabunnyModule) {
    mediabunnyModule = import('mediabunny');
  }
  return mediabunnyModule;
}

function toPacketInfo(packet: EncodedPacket): MediaPacketInfo {
  return {
    timestamp: packet.timestamp,
    duration: Number.isFinite(packet.duration) ? Math.max(0, packet.duration) : 0,
  };
}

function wrapTrack(mb: MediabunnyModule, track: InputVideoTrack): ProbedVideoTrack {
  const sink = new mb.EncodedPacketSink(track);

  return {
    id: track.id,
    codec: track.codec,
    codedWidth: track.codedWidth,
    codedHeight: track.codedHeight,
    rotation: track.rotation,

    async readFirstPacket() {
      const packet = await sink.getFirstPacket();
      return packet ? toPacketInfo(packet) : null;
    },

    readPackets() {
      return (async function* () {
        let packet = await sink.getFirstPacket();
        while (packet) {
          yield toPacketInfo(packet);
          packet = await sink.getNextPacket(packet);
        }
      })();
    },
  };
}

class MediabunnyMedia implements ProbedMedia {
  private input: Promise<{ mb: MediabunnyModule; input: Input }> | null = null;
  private closed = false;

  constructor(private readonly path: string) {}

  private open(): Promise<{ mb: MediabunnyModule; input: Input }> {
    if (this.closed) {
      return Promise.reject(new Error(`Media already closed: ${this.path}`));
    }
    if (!this.input) {
      this.input = getMediabunny().then((mb) => ({
        mb,
        input: new mb.Input({
          formats: mb.ALL_FORMATS,
          source: new mb.FilePathSource(this.path),
        }),
      }));
    }
    return this.input;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input
      ?.then(({ input }) => input.dispose())
      .catch((error: unknown) => {
        logger.debug('Failed to dispose input', { path: this.path, error });
      });
  }

  async isPlayable(): Promise<boolean> {
    const { input } = await this.open();
    try {
      const format = await input.getFormat();
      logger.debug(`Detected ${format.name} container`, { path: this.path });
      return true;
    } catch (error) {
      logger.debug('Container format not recognised', { path: this.path, error });
      return false;
    }
  }

  async computeDuration(): Promise<number> {
    const { input } = await this.open();
    return input.computeDuration();
  }

  async getVideoTracks(): Promise<ProbedVideoTrack[]> {
    const { mb, input } = await this.open();
    const tracks = await input.getVideoTracks();
    return tracks.map((track) => wrapTrack(mb, track));
  }
}

export function createMediabunnyProbe(): MediaProbe {
  return {
    async exists(path) {
      try {
        const info = await stat(path);
        return info.isFile();
      } catch (error) {
        logger.debug('stat failed', { path, error });
        return false;
      }
    },

    open(path) {
      return new MediabunnyMedia(path);
    },
  };
}
