import { DateTime } from 'luxon';
import { z } from 'zod';

import {
  AppointmentIntent,
  AppointmentWebhookPayload,
  appointmentWebhookPayloadSchema,
} from '@voice-intake/shared';

export const DEFAULT_CUSTOMER_NAME = 'Customer';
export const DEFAULT_SUMMARY = 'Appointment scheduled via phone';
export const MIN_PHONE_DIGITS = 10;

// Structural only: something before "@", a dot somewhere in the domain.
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export type IntentField = 'caller_phone' | 'callback_time' | 'email';

export class IntentValidationError extends Error {
  constructor(
    public readonly field: IntentField,
    message: string,
  ) {
    super(message);
    this.name = 'IntentValidationError';
  }
}

export type IntentNormalizationResult =
  | { success: true; intent: AppointmentIntent }
  | { success: false; error: IntentValidationError };

export interface NormalizeOptions {
  defaultTimezone: string;
}

export function countDigits(value: string): number {
  return value.replace(/\D/g, '').length;
}

const callerPhoneSchema = z
  .string({
    required_error: 'caller is required',
    invalid_type_error: 'caller must be a string',
  })
  .trim()
  .refine((value) => countDigits(value) >= MIN_PHONE_DIGITS, {
    message: `caller must contain at least ${MIN_PHONE_DIGITS} digits`,
  });

const callbackTimeSchema = z
  .string({
    required_error: 'callback_time is required',
    invalid_type_error: 'callback_time must be an ISO 8601 string',
  })
  .trim()
  .min(1, 'callback_time is required');

const customerEmailSchema = z
  .string({ invalid_type_error: 'email must be a string' })
  .trim()
  .regex(EMAIL_PATTERN, 'email must be a valid email address');

function optionalText(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// Blank strings and null count as "not provided" for optional fields.
function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }

  return typeof value !== 'string' || value.trim().length > 0;
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid value';
}

// A calendar date is required; luxon would otherwise fill a bare time with today.
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/**
 * Parses an ISO 8601 timestamp. An explicit offset (or "Z") is kept as given;
 * a timestamp without one is read as wall-clock time in the default timezone.
 */
export function parseScheduledAt(value: string, defaultTimezone: string): DateTime | null {
  if (!ISO_DATE_PREFIX.test(value)) {
    return null;
  }

  const parsed = DateTime.fromISO(value, { zone: defaultTimezone, setZone: true });
  return parsed.isValid ? parsed : null;
}

/**
 * Validates a raw webhook body and builds the appointment intent. Fields are
 * checked in a fixed order (caller, callback time, email) and only the first
 * failure is reported.
 */
export function normalizeAppointmentIntent(
  raw: unknown,
  options: NormalizeOptions,
): IntentNormalizationResult {
  const parsedPayload = appointmentWebhookPayloadSchema.safeParse(raw);
  const payload: AppointmentWebhookPayload = parsedPayload.success ? parsedPayload.data : {};
  const fail = (field: IntentField, message: string): IntentNormalizationResult => ({
    success: false,
    error: new IntentValidationError(field, message),
  });

  const phone = callerPhoneSchema.safeParse(payload.caller);
  if (!phone.success) {
    return fail('caller_phone', firstIssue(phone.error));
  }

  const callbackTime = callbackTimeSchema.safeParse(payload.callback_time);
  if (!callbackTime.success) {
    return fail('callback_time', firstIssue(callbackTime.error));
  }

  const scheduledAt = parseScheduledAt(callbackTime.data, options.defaultTimezone);
  if (scheduledAt === null) {
    return fail('callback_time', 'callback_time must be a valid ISO 8601 datetime');
  }

  let customerEmail: string | undefined;
  if (isPresent(payload.email)) {
    const email = customerEmailSchema.safeParse(payload.email);
    if (!email.success) {
      return fail('email', firstIssue(email.error));
    }
    customerEmail = email.data;
  }

  const transcript = optionalText(payload.transcript);
  const intentLabel = optionalText(payload.intent);

  const intent: AppointmentIntent = {
    callerPhone: phone.data,
    customerName: optionalText(payload.customer_name) ?? DEFAULT_CUSTOMER_NAME,
    summary: optionalText(payload.summary) ?? DEFAULT_SUMMARY,
    scheduledAt,
    ...(transcript === undefined ? {} : { transcript }),
    ...(intentLabel === undefined ? {} : { intentLabel }),
    ...(customerEmail === undefined ? {} : { customerEmail }),
  };

  return { success: true, intent: Object.freeze(intent) };
}
