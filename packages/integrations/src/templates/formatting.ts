import type { DateTime } from 'luxon';

const DISPLAY_LOCALE = 'en-US';

function inDisplayZone(value: DateTime, displayTimezone: string): DateTime {
  return value.setZone(displayTimezone).setLocale(DISPLAY_LOCALE);
}

// "Monday, December 08 at 03:00 PM"
export function formatSmsDateTime(value: DateTime, displayTimezone: string): string {
  return inDisplayZone(value, displayTimezone).toFormat("cccc, LLLL dd 'at' hh:mm a");
}

// "Monday, December 08, 2025"
export function formatLongDate(value: DateTime, displayTimezone: string): string {
  return inDisplayZone(value, displayTimezone).toFormat('cccc, LLLL dd, yyyy');
}

// "03:00 PM PST"
export function formatTimeWithZone(value: DateTime, displayTimezone: string): string {
  return inDisplayZone(value, displayTimezone).toFormat('hh:mm a ZZZZ');
}

export function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }

  return `${value.slice(0, Math.max(0, maxChars - 1)).trimEnd()}…`;
}

const htmlEntities: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (character) => htmlEntities[character] ?? character);
}
