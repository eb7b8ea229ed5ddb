/**
 * Formats the time since a start timestamp as a game clock.
 * @param startedAt - Unix timestamp in milliseconds
 * @returns e.g. "0:07", "12:40", "1:02:09"
 */
export function formatElapsed(startedAt: number, now: number = Date.now()): string {
  const total = Math.max(0, Math.floor((now - startedAt) / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;

  const ss = String(seconds).padStart(2, "0");
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${ss}`;
  }
  return `${minutes}:${ss}`;
}
