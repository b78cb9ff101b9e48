import twilio from 'twilio';

import type { AppointmentIntent, DeliveryReceipt } from '@voice-intake/shared';

import { buildSmsConfirmation, SmsTemplateOptions } from './templates/sms-templates.js';
import { ADAPTER_ERROR_CODES, AdapterError, SmsAdapter, toAdapterError } from './types.js';

export interface TwilioMessageApi {
  create(params: { to: string; from: string; body: string }): Promise<{ sid: string }>;
}

/**
 * Builds the Twilio client on first use. The SDK rejects malformed account
 * SIDs while constructing the client; that failure is reported per attempt.
 */
export function createTwilioMessageApi(accountSid: string, authToken: string): TwilioMessageApi {
  let client: ReturnType<typeof twilio> | undefined;

  const resolveClient = (): ReturnType<typeof twilio> => {
    if (client === undefined) {
      try {
        client = twilio(accountSid, authToken);
      } catch (error) {
        throw new AdapterError(
          'sms',
          ADAPTER_ERROR_CODES.INVALID_CREDENTIALS,
          error instanceof Error ? error.message : 'Twilio credentials were rejected',
          { cause: error },
        );
      }
    }

    return client;
  };

  return {
    async create(params) {
      const message = await resolveClient().messages.create(params);
      return { sid: message.sid };
    },
  };
}

export interface TwilioSmsAdapterOptions extends SmsTemplateOptions {
  fromNumber: string;
  messages: TwilioMessageApi;
}

export class TwilioSmsAdapter implements SmsAdapter {
  constructor(private readonly options: TwilioSmsAdapterOptions) {}

  async sendSms(intent: AppointmentIntent): Promise<DeliveryReceipt> {
    const body = buildSmsConfirmation(intent, this.options);

    let sid: string;
    try {
      ({ sid } = await this.options.messages.create({
        to: intent.callerPhone,
        from: this.options.fromNumber,
        body,
      }));
    } catch (error) {
      throw toAdapterError('sms', error);
    }

    if (sid.length === 0) {
      throw new AdapterError(
        'sms',
        ADAPTER_ERROR_CODES.MALFORMED_RESPONSE,
        'Twilio accepted the message without returning a SID',
      );
    }

    return { messageId: sid };
  }
}
