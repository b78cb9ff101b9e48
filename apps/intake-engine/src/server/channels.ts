import {
  createGoogleCalendarEventsApi,
  createSmtpMailTransport,
  createTwilioMessageApi,
  GoogleCalendarAdapter,
  SmtpEmailAdapter,
  TwilioSmsAdapter,
} from '@voice-intake/integrations';
import type { ChannelName } from '@voice-intake/shared';

import type { IntakeChannels } from './appointment-orchestrator.js';
import { displayTimezone, IntakeConfig, smtpSecure } from './config.js';
import type { Logger } from './logger.js';

export type ChannelAvailability = Record<ChannelName, boolean>;

export function resolveChannelAvailability(config: IntakeConfig): ChannelAvailability {
  return {
    calendar: config.GOOGLE_SERVICE_ACCOUNT_JSON_B64 !== undefined,
    sms:
      config.TWILIO_ACCOUNT_SID !== undefined &&
      config.TWILIO_AUTH_TOKEN !== undefined &&
      config.TWILIO_PHONE_NUMBER !== undefined,
    email: config.EMAIL_FROM !== undefined && config.EMAIL_PASSWORD !== undefined,
  };
}

/**
 * Builds one adapter per configured channel. Channels without credentials are
 * left null and reported once here rather than on every request.
 */
export function createIntakeChannels(config: IntakeConfig, logger: Logger): IntakeChannels {
  const timezone = displayTimezone(config);

  const calendar =
    config.GOOGLE_SERVICE_ACCOUNT_JSON_B64 === undefined
      ? null
      : new GoogleCalendarAdapter({
          calendarId: config.GOOGLE_CALENDAR_ID,
          durationMinutes: config.APPOINTMENT_DURATION_MINUTES,
          displayTimezone: timezone,
          transcriptMaxChars: config.CALENDAR_TRANSCRIPT_MAX_CHARS,
          events: createGoogleCalendarEventsApi(config.GOOGLE_SERVICE_ACCOUNT_JSON_B64),
        });

  const sms =
    config.TWILIO_ACCOUNT_SID === undefined ||
    config.TWILIO_AUTH_TOKEN === undefined ||
    config.TWILIO_PHONE_NUMBER === undefined
      ? null
      : new TwilioSmsAdapter({
          fromNumber: config.TWILIO_PHONE_NUMBER,
          businessName: config.BUSINESS_NAME,
          displayTimezone: timezone,
          messages: createTwilioMessageApi(config.TWILIO_ACCOUNT_SID, config.TWILIO_AUTH_TOKEN),
        });

  const email =
    config.EMAIL_FROM === undefined || config.EMAIL_PASSWORD === undefined
      ? null
      : new SmtpEmailAdapter({
          fromAddress: config.EMAIL_FROM,
          businessName: config.BUSINESS_NAME,
          displayTimezone: timezone,
          transport: createSmtpMailTransport({
            host: config.SMTP_HOST,
            port: config.SMTP_PORT,
            secure: smtpSecure(config),
            user: config.EMAIL_USER ?? config.EMAIL_FROM,
            password: config.EMAIL_PASSWORD,
            timeoutMs: config.CHANNEL_TIMEOUT_MS,
          }),
        });

  const channels: IntakeChannels = { calendar, sms, email };
  for (const [name, adapter] of Object.entries(channels)) {
    if (adapter === null) {
      logger.warn('channel not configured, notifications disabled', { channel: name });
    } else {
      logger.info('channel configured', { channel: name });
    }
  }

  return channels;
}
