const pad = (value: number): string => String(value).padStart(2, '0');

/** Local calendar date as `YYYYMMDD`. */
export function formatDate(date: Date = new Date()): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** Local wall-clock time as `HHMMSS`. */
export function formatTime(date: Date = new Date()): string {
  return `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, ms) / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = (totalSeconds % 60).toFixed(3).padStart(6, '0');
  return `${hours}:${pad(minutes)}:${seconds}`;
}
