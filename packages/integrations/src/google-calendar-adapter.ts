import { google } from 'googleapis';
import type { calendar_v3 } from 'googleapis';
import { z } from 'zod';

import type { AppointmentIntent, CalendarBooking } from '@voice-intake/shared';

import { buildCalendarEvent, CalendarEventOptions } from './templates/calendar-event.js';
import { ADAPTER_ERROR_CODES, AdapterError, CalendarAdapter, toAdapterError } from './types.js';

const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

export interface CalendarEventsApi {
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<calendar_v3.Schema$Event>;
}

export function decodeServiceAccountCredentials(encoded: string): ServiceAccountCredentials {
  try {
    const json: unknown = JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'));
    return serviceAccountSchema.parse(json);
  } catch (error) {
    throw new AdapterError(
      'calendar',
      ADAPTER_ERROR_CODES.INVALID_CREDENTIALS,
      'Google service account credentials are not valid base64-encoded JSON',
      { cause: error },
    );
  }
}

/**
 * Builds the Calendar API client on first use and keeps it for the life of the
 * process. Undecodable credentials fail every insert.
 */
export function createGoogleCalendarEventsApi(encodedCredentials: string): CalendarEventsApi {
  let events: calendar_v3.Resource$Events | undefined;

  const resolveEvents = (): calendar_v3.Resource$Events => {
    if (events === undefined) {
      const credentials = decodeServiceAccountCredentials(encodedCredentials);
      const auth = new google.auth.JWT({
        email: credentials.client_email,
        key: credentials.private_key,
        scopes: CALENDAR_SCOPES,
      });
      events = google.calendar({ version: 'v3', auth }).events;
    }

    return events;
  };

  return {
    async insert(params) {
      const response = await resolveEvents().insert(params);
      return response.data;
    },
  };
}

export interface GoogleCalendarAdapterOptions extends CalendarEventOptions {
  calendarId: string;
  events: CalendarEventsApi;
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  constructor(private readonly options: GoogleCalendarAdapterOptions) {}

  async createEvent(intent: AppointmentIntent): Promise<CalendarBooking> {
    const requestBody = buildCalendarEvent(intent, this.options);

    let created: calendar_v3.Schema$Event;
    try {
      created = await this.options.events.insert({
        calendarId: this.options.calendarId,
        requestBody,
        sendUpdates: intent.customerEmail === undefined ? 'none' : 'all',
      });
    } catch (error) {
      throw toAdapterError('calendar', error);
    }

    if (typeof created.id !== 'string' || created.id.length === 0) {
      throw new AdapterError(
        'calendar',
        ADAPTER_ERROR_CODES.MALFORMED_RESPONSE,
        'Calendar API returned an event without an id',
      );
    }

    return {
      eventId: created.id,
      eventLink: created.htmlLink ?? null,
    };
  }
}
