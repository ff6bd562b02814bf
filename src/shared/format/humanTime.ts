/**
 * Formats a duration in whole seconds, e.g. `3725` -> `"1 hours 2 minutes 5 seconds"`.
 */
export const humanTime = (totalSeconds: number): string => {
  const seconds = Number.isFinite(totalSeconds) ? Math.max(0, Math.floor(totalSeconds)) : 0;
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours} hours`);
  if (minutes > 0) parts.push(`${minutes} minutes`);
  if (rest > 0) parts.push(`${rest} seconds`);
  return parts.length > 0 ? parts.join(" ") : "0 seconds";
};
