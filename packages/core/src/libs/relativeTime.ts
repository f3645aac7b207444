function formatSpan(totalSeconds: number): string {
  if (totalSeconds < 60) {
    return `${totalSeconds}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) {
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}

/**
 * Formats a timestamp relative to `now`: "5m ago" for the past,
 * "in 1h 12m" for the future.
 */
export function formatRelativeTime(timestamp: number, now: number = Date.now()): string {
  const seconds = Math.floor(Math.abs(now - timestamp) / 1000);
  const span = formatSpan(seconds);
  return timestamp > now ? `in ${span}` : `${span} ago`;
}
