import type { DateTime } from 'luxon';
import { z } from 'zod';

export const CHANNEL_NAMES = ['calendar', 'sms', 'email'] as const;

export type ChannelName = (typeof CHANNEL_NAMES)[number];

// Raw body posted by the voice agent once a call ends. Every field is read
// loosely here; the intake normalizer decides what is required.
export const appointmentWebhookPayloadSchema = z
  .object({
    caller: z.unknown().optional(),
    customer_name: z.unknown().optional(),
    summary: z.unknown().optional(),
    transcript: z.unknown().optional(),
    intent: z.unknown().optional(),
    callback_time: z.unknown().optional(),
    email: z.unknown().optional(),
  })
  .passthrough();

export type AppointmentWebhookPayload = z.infer<typeof appointmentWebhookPayloadSchema>;

export interface AppointmentIntent {
  readonly callerPhone: string;
  readonly customerName: string;
  readonly summary: string;
  readonly transcript?: string;
  readonly intentLabel?: string;
  readonly scheduledAt: DateTime;
  readonly customerEmail?: string;
}

export type SkipReason = 'unconfigured' | 'no_recipient';

export interface SucceededOutcome<TValue> {
  state: 'succeeded';
  attempted: true;
  succeeded: true;
  detail?: string;
  value: TValue;
}

export interface FailedOutcome {
  state: 'failed';
  attempted: true;
  succeeded: false;
  error: string;
  errorCode?: string;
}

export interface SkippedOutcome {
  state: 'skipped';
  attempted: false;
  succeeded: false;
  reason: SkipReason;
  detail: string;
}

export type ChannelOutcome<TValue> = SucceededOutcome<TValue> | FailedOutcome | SkippedOutcome;

export interface CalendarBooking {
  eventId: string;
  eventLink: string | null;
}

export interface DeliveryReceipt {
  messageId: string;
}

export interface AppointmentResult {
  intent: AppointmentIntent;
  calendar: ChannelOutcome<CalendarBooking>;
  sms: ChannelOutcome<DeliveryReceipt>;
  email: ChannelOutcome<DeliveryReceipt>;
}

export const channelOutcomeSummarySchema = z.object({
  attempted: z.boolean(),
  succeeded: z.boolean(),
  detail: z.string().nullable(),
  error: z.string().nullable(),
});

export type ChannelOutcomeSummary = z.infer<typeof channelOutcomeSummarySchema>;

export const appointmentWebhookResponseSchema = z.object({
  status: z.enum(['success', 'partial']),
  message: z.string().min(1),
  data: z.object({
    calendar_created: z.boolean(),
    sms_sent: z.boolean(),
    email_sent: z.boolean(),
    calendar_event_id: z.string().nullable(),
    calendar_link: z.string().nullable(),
  }),
  channels: z.object({
    calendar: channelOutcomeSummarySchema,
    sms: channelOutcomeSummarySchema,
    email: channelOutcomeSummarySchema,
  }),
  customer: z.object({
    name: z.string(),
    phone: z.string(),
    email: z.string().nullable(),
  }),
  appointment_time: z.string(),
});

export type AppointmentWebhookResponse = z.infer<typeof appointmentWebhookResponseSchema>;

export function summarizeOutcome<TValue>(outcome: ChannelOutcome<TValue>): ChannelOutcomeSummary {
  switch (outcome.state) {
    case 'succeeded':
      return { attempted: true, succeeded: true, detail: outcome.detail ?? null, error: null };
    case 'failed':
      return { attempted: true, succeeded: false, detail: null, error: outcome.error };
    case 'skipped':
      return { attempted: false, succeeded: false, detail: outcome.detail, error: null };
  }
}

export function hasFailedChannel(result: AppointmentResult): boolean {
  return [result.calendar, result.sms, result.email].some((outcome) => outcome.state === 'failed');
}

export function buildAppointmentWebhookResponse(
  result: AppointmentResult,
): AppointmentWebhookResponse {
  const { intent, calendar, sms, email } = result;
  const booking = calendar.state === 'succeeded' ? calendar.value : null;
  const partial = hasFailedChannel(result);

  return {
    status: partial ? 'partial' : 'success',
    message: partial
      ? 'Appointment processed with channel failures'
      : 'Appointment processed successfully',
    data: {
      calendar_created: calendar.succeeded,
      sms_sent: sms.succeeded,
      email_sent: email.succeeded,
      calendar_event_id: booking?.eventId ?? null,
      calendar_link: booking?.eventLink ?? null,
    },
    channels: {
      calendar: summarizeOutcome(calendar),
      sms: summarizeOutcome(sms),
      email: summarizeOutcome(email),
    },
    customer: {
      name: intent.customerName,
      phone: intent.callerPhone,
      email: intent.customerEmail ?? null,
    },
    appointment_time: intent.scheduledAt.toISO({ suppressMilliseconds: true }) ?? '',
  };
}
