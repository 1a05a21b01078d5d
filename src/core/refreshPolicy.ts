export interface RefreshWindow {
  refreshTimestamps: number[]
  refreshSafetyIntervalMs: number
  refreshCountAllowed: number
}

export function countRefreshesWithinWindow(timestamps: readonly number[], now: number, intervalMs: number): number {
  const windowStart = now - intervalMs
  return timestamps.reduce((count, timestamp) => (windowStart <= timestamp ? count + 1 : count), 0)
}

/**
 * Drops attempts older than the safety window. Timestamps are appended in order,
 * so everything before the first in-window entry can go.
 */
export function pruneRefreshTimestamps(timestamps: readonly number[], now: number, intervalMs: number): number[] {
  const windowStart = now - intervalMs
  const firstInWindow = timestamps.findIndex(timestamp => windowStart <= timestamp)
  return firstInWindow === -1 ? [] : timestamps.slice(firstInWindow)
}

/**
 * A refresh is excessive once more than `refreshCountAllowed` attempts fall inside the
 * trailing `refreshSafetyIntervalMs`. Prunes the window's history as a side effect.
 */
export function isRefreshExcessive(window: RefreshWindow, now: number): boolean {
  window.refreshTimestamps = pruneRefreshTimestamps(window.refreshTimestamps, now, window.refreshSafetyIntervalMs)
  const count = countRefreshesWithinWindow(window.refreshTimestamps, now, window.refreshSafetyIntervalMs)
  return count > window.refreshCountAllowed
}
