export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) {
    return `${Math.max(0, Math.round(durationMs))}ms`;
  }
  const seconds = durationMs / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainder = Math.round(seconds % 60);
  if (minutes < 60) {
    return `${minutes}m${remainder}s`;
  }
  return `${Math.floor(minutes / 60)}h${minutes % 60}m`;
}

export function formatElapsed(startedAt: string | undefined, now: number): string | undefined {
  if (!startedAt) {
    return undefined;
  }
  const started = Date.parse(startedAt);
  return Number.isNaN(started) ? undefined : formatDuration(now - started);
}
