import fs from "node:fs";
import path from "node:path";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

// asctime layout in local time, e.g. "Sun Oct 18 15:27:00 2026" or "Thu Oct  8 09:05:00 2026".
export function formatAsctime(date: Date): string {
  const weekday = WEEKDAYS[date.getDay()] ?? "";
  const month = MONTHS[date.getMonth()] ?? "";
  const day = String(date.getDate()).padStart(2, " ");
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${weekday} ${month} ${day} ${time} ${date.getFullYear()}`;
}

/** Modification time of the marker in ms, or null when no extraction has run yet. */
export function readTimestampMtime(timestampPath: string): number | null {
  if (!fs.existsSync(timestampPath)) return null;
  return fs.statSync(timestampPath).mtimeMs;
}

// The marker's mtime is what later runs compare against; the content is for humans.
export function writeTimestamp(timestampPath: string, now: Date = new Date()): void {
  fs.mkdirSync(path.dirname(timestampPath), { recursive: true });
  fs.writeFileSync(timestampPath, formatAsctime(now), "utf8");
}
