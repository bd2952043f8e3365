const DAY_SECONDS = 86400;
const HOUR_SECONDS = 3600;
const MINUTE_SECONDS = 60;

/** Formats a span as "hours: H | minutes: M | seconds: S", prefixed by "days: D | " when it spans days. */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(whole / DAY_SECONDS);
  const hours = Math.floor((whole % DAY_SECONDS) / HOUR_SECONDS);
  const minutes = Math.floor((whole % HOUR_SECONDS) / MINUTE_SECONDS);
  const seconds = whole % MINUTE_SECONDS;

  const time = `hours: ${hours} | minutes: ${minutes} | seconds: ${seconds}`;
  return days > 0 ? `days: ${days} | ${time}` : time;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/** DD/MM/YYYY HH:MM:SS in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
