import type { calendar_v3 } from 'googleapis';

import type { AppointmentIntent } from '@voice-intake/shared';

import { truncate } from './formatting.js';

export interface CalendarEventOptions {
  durationMinutes: number;
  displayTimezone: string;
  transcriptMaxChars: number;
}

export const CALENDAR_REMINDERS: calendar_v3.Schema$EventReminder[] = [
  { method: 'email', minutes: 24 * 60 },
  { method: 'popup', minutes: 30 },
];

export function buildCalendarEventDescription(
  intent: AppointmentIntent,
  transcriptMaxChars: number,
): string {
  const lines = [`Customer: ${intent.customerName}`, `Phone: ${intent.callerPhone}`];

  if (intent.customerEmail !== undefined) {
    lines.push(`Email: ${intent.customerEmail}`);
  }
  if (intent.intentLabel !== undefined) {
    lines.push(`Intent: ${intent.intentLabel}`);
  }

  lines.push('', 'Summary:', intent.summary);

  if (intent.transcript !== undefined) {
    lines.push('', 'Transcript:', truncate(intent.transcript, transcriptMaxChars));
  }

  return lines.join('\n');
}

export function buildCalendarEvent(
  intent: AppointmentIntent,
  options: CalendarEventOptions,
): calendar_v3.Schema$Event {
  const start = intent.scheduledAt;
  const end = start.plus({ minutes: options.durationMinutes });

  return {
    summary: `Appointment: ${intent.customerName}`,
    description: buildCalendarEventDescription(intent, options.transcriptMaxChars),
    start: {
      dateTime: start.toISO({ suppressMilliseconds: true }),
      timeZone: options.displayTimezone,
    },
    end: {
      dateTime: end.toISO({ suppressMilliseconds: true }),
      timeZone: options.displayTimezone,
    },
    attendees: intent.customerEmail === undefined ? [] : [{ email: intent.customerEmail }],
    reminders: {
      useDefault: false,
      overrides: CALENDAR_REMINDERS,
    },
  };
}
