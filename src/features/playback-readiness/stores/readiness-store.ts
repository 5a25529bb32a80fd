import { createStore, type StoreApi } from 'zustand/vanilla';
import type { DisplaySize, LoadState, MediaPlayer, ResourceLocator, ValidatedHandle } from '../types';
import { describePlaybackError, type PlaybackReadinessError } from '../utils/playback-errors';

export interface ReadinessState {
  loadState: LoadState;
  /** Locator of the current attempt, null when idle */
  locator: ResourceLocator | null;
  /** Live player, only while ready */
  player: MediaPlayer | null;
  displaySize: DisplaySize | null;
  duration: number | null;
}

export interface ReadinessActions {
  beginLoading: (locator: ResourceLocator) => void;
  markReady: (player: MediaPlayer, handle: ValidatedHandle) => void;
  markFailed: (error: PlaybackReadinessError) => void;
  reset: () => void;
}

export type ReadinessStore = StoreApi<ReadinessState & ReadinessActions>;

const IDLE_STATE: ReadinessState = {
  loadState: { status: 'idle' },
  locator: null,
  player: null,
  displaySize: null,
  duration: null,
};

/**
 * One store per coordinator. Consumers read it with getState() and
 * subscribe(); only the coordinator calls the actions.
 */
export function createReadinessStore(): ReadinessStore {
  return createStore<ReadinessState & ReadinessActions>()((set) => ({
    ...IDLE_STATE,

    beginLoading: (locator) =>
      set({
        ...IDLE_STATE,
        loadState: { status: 'loading' },
        locator,
      }),

    markReady: (player, handle) =>
      set({
        loadState: { status: 'ready' },
        player,
        displaySize: { ...handle.displaySize },
        duration: handle.duration,
      }),

    markFailed: (error) =>
      set({
        loadState: { status: 'failed', reason: error.kind, message: describePlaybackError(error) },
        player: null,
        displaySize: null,
        duration: null,
      }),

    reset: () => set(IDLE_STATE),
  }));
}
