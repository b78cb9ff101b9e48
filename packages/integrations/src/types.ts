import type {
  AppointmentIntent,
  CalendarBooking,
  ChannelName,
  DeliveryReceipt,
} from '@voice-intake/shared';

export interface CalendarAdapter {
  createEvent(intent: AppointmentIntent): Promise<CalendarBooking>;
}

export interface SmsAdapter {
  sendSms(intent: AppointmentIntent): Promise<DeliveryReceipt>;
}

export interface EmailAdapter {
  sendEmail(intent: AppointmentIntent, calendarLink?: string): Promise<DeliveryReceipt>;
}

export const ADAPTER_ERROR_CODES = {
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  PROVIDER_REJECTED: 'PROVIDER_REJECTED',
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT: 'TIMEOUT',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
} as const;

export type AdapterErrorCode = (typeof ADAPTER_ERROR_CODES)[keyof typeof ADAPTER_ERROR_CODES];

export class AdapterError extends Error {
  constructor(
    public readonly channel: ChannelName,
    public readonly code: AdapterErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AdapterError';
  }
}

const networkErrorCodes = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ESOCKET',
  'ECONNECTION',
  'EDNS',
]);

const timeoutErrorCodes = new Set(['ETIMEDOUT', 'ETIMEOUT', 'ESOCKETTIMEDOUT']);

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  const value: unknown = Reflect.get(error, key);
  return value;
}

function getHttpStatus(error: unknown): number | null {
  for (const key of ['status', 'statusCode', 'responseCode']) {
    const value = readProperty(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }

  const response = readProperty(error, 'response');
  const nested = readProperty(response, 'status');
  return typeof nested === 'number' ? nested : null;
}

function classify(error: unknown): AdapterErrorCode {
  const code = readProperty(error, 'code');

  if (typeof code === 'string') {
    if (code === 'EAUTH') {
      return ADAPTER_ERROR_CODES.INVALID_CREDENTIALS;
    }
    if (timeoutErrorCodes.has(code)) {
      return ADAPTER_ERROR_CODES.TIMEOUT;
    }
    if (networkErrorCodes.has(code)) {
      return ADAPTER_ERROR_CODES.NETWORK_ERROR;
    }
  }

  const status = getHttpStatus(error);
  if (status === 401 || status === 403 || status === 535) {
    return ADAPTER_ERROR_CODES.INVALID_CREDENTIALS;
  }

  return ADAPTER_ERROR_CODES.PROVIDER_REJECTED;
}

/**
 * Normalizes whatever a provider SDK threw into an {@link AdapterError} for the
 * given channel. Errors that already are adapter errors pass through untouched.
 */
export function toAdapterError(channel: ChannelName, error: unknown): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AdapterError(channel, classify(error), message, { cause: error });
}
