import { PlaybackState } from './types';

/** Millisecond wall-clock source. Injected so tests can drive time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Logical playback position in seconds. Paused state reports the anchor as-is;
 * playing state extrapolates from the anchor pair and never runs backwards when
 * `nowMs` precedes the anchor.
 */
export function currentPosition(state: PlaybackState, nowMs: number): number {
  if (!state.isPlaying) return state.positionAnchorSeconds;
  const elapsed = Math.max(0, nowMs - state.anchorTimestamp) / 1000;
  return state.positionAnchorSeconds + elapsed;
}

// Transport commands always build a new pair, never shift an existing one
export function anchorAt(
  trackIndex: number | null,
  positionSeconds: number,
  isPlaying: boolean,
  nowMs: number
): PlaybackState {
  return {
    trackIndex,
    isPlaying,
    positionAnchorSeconds: positionSeconds,
    anchorTimestamp: nowMs
  };
}

// Infinity when the duration is unknown (0)
export function remainingSeconds(state: PlaybackState, durationSeconds: number, nowMs: number): number {
  if (durationSeconds <= 0) return Infinity;
  return durationSeconds - currentPosition(state, nowMs);
}

export const emptyPlayback = (nowMs: number): PlaybackState => anchorAt(null, 0, false, nowMs);
