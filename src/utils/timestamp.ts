const LONG_FORMAT = new Intl.DateTimeFormat('en-US', {
  weekday: 'long',
  month: 'long',
  day: '2-digit',
  year: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hour12: true,
});

/**
 * "Monday, October 19, 2026 01:33:00 PM"
 */
export function formatLongTimestamp(date: Date = new Date()): string {
  const parts = new Map<string, string>();
  for (const part of LONG_FORMAT.formatToParts(date)) {
    parts.set(part.type, part.value);
  }
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.get(type) ?? '';

  return `${get('weekday')}, ${get('month')} ${get('day')}, ${get('year')} ${get('hour')}:${get('minute')}:${get('second')} ${get('dayPeriod').toUpperCase()}`;
}
