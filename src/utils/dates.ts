export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// Local time, matching the dates people type into front matter by hand.

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatCompactDate(date: Date): string {
  return formatDate(date).replaceAll("-", "");
}

export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
