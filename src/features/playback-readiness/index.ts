// Playback readiness feature: public API
// Validates a local media file, races it against a deadline and owns the resulting player

export { PlaybackCoordinator } from './services/playback-coordinator';
export type { PrepareOptions, PlaybackCoordinatorDeps } from './services/playback-coordinator';
export { AssetValidator } from './services/asset-validator';
export type { AssetValidatorOptions, ValidationResult, ValidationTask } from './services/asset-validator';
export { LoadWatchdog } from './services/load-watchdog';
export { PlayerOwner } from './services/player-owner';
export type { PlayerSessionCallbacks } from './services/player-owner';
export { PacketPlayer, createPacketPlayer } from './services/packet-player';
export { PlayerEmitter } from './services/player-emitter';
export type {
  CallbackListener,
  PlayerEventTypes,
  PlayerListenerSet,
  PlayerStateEventMap,
} from './services/player-emitter';
export { createMediabunnyProbe } from './services/media-probe';
export { createReadinessStore } from './stores/readiness-store';
export type { ReadinessActions, ReadinessState, ReadinessStore } from './stores/readiness-store';
export {
  PlaybackReadinessError,
  describePlaybackError,
  toPlaybackReadinessError,
} from './utils/playback-errors';
export { computeDisplaySize } from './utils/display-geometry';
export { describeLocator, resolveLocatorPath } from './utils/resource-locator';
export type {
  DisplaySize,
  LoadState,
  LoadStatus,
  MediaPacketInfo,
  MediaPlayer,
  MediaProbe,
  PlaybackErrorKind,
  PlayerFactory,
  PlayerStatus,
  ProbedMedia,
  ProbedVideoTrack,
  ResourceLocator,
  ValidatedHandle,
  ValidationErrorKind,
} from './types';
