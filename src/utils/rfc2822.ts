const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `Mon, 01 Jan 2024 09:30:00 +0100`. The offset defaults to the host's local
 * offset at `date`; pass it explicitly to pin the output.
 */
export function formatRfc2822(date: Date, offsetMinutes = -date.getTimezoneOffset()): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absolute = Math.abs(offsetMinutes);
  const zone = `${sign}${pad2(Math.floor(absolute / 60))}${pad2(absolute % 60)}`;

  return (
    `${WEEKDAYS[shifted.getUTCDay()]}, ${pad2(shifted.getUTCDate())} ${MONTHS[shifted.getUTCMonth()]} ` +
    `${shifted.getUTCFullYear()} ${pad2(shifted.getUTCHours())}:${pad2(shifted.getUTCMinutes())}:` +
    `${pad2(shifted.getUTCSeconds())} ${zone}`
  );
}

export function parseRfc2822(value: string): Date | undefined {
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? new Date(ms) : undefined;
}
