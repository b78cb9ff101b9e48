import type {
  AppointmentIntent,
  AppointmentResult,
  CalendarBooking,
  ChannelName,
  ChannelOutcome,
  DeliveryReceipt,
  SkipReason,
} from '@voice-intake/shared';
import {
  CalendarAdapter,
  EmailAdapter,
  SmsAdapter,
  toAdapterError,
} from '@voice-intake/integrations';

import { withDeadline } from './deadline.js';
import { Logger } from './logger.js';

export interface IntakeChannels {
  calendar: CalendarAdapter | null;
  sms: SmsAdapter | null;
  email: EmailAdapter | null;
}

export interface AppointmentOrchestratorOptions {
  channels: IntakeChannels;
  logger: Logger;
  channelTimeoutMs: number;
}

function skipped(reason: SkipReason, detail: string): ChannelOutcome<never> {
  return { state: 'skipped', attempted: false, succeeded: false, reason, detail };
}

/**
 * Fans one appointment intent out to the calendar, SMS and email channels.
 *
 * Calendar and SMS start together; email waits for the calendar attempt to
 * settle so it can carry the event link. Every channel resolves to an outcome;
 * nothing thrown by an adapter leaves `process`.
 */
export class AppointmentOrchestrator {
  constructor(private readonly options: AppointmentOrchestratorOptions) {}

  async process(intent: AppointmentIntent): Promise<AppointmentResult> {
    const { calendar: calendarAdapter, sms: smsAdapter, email: emailAdapter } =
      this.options.channels;

    const calendarAttempt: Promise<ChannelOutcome<CalendarBooking>> =
      calendarAdapter === null
        ? Promise.resolve(skipped('unconfigured', 'calendar channel is not configured'))
        : this.attempt('calendar', () => calendarAdapter.createEvent(intent), (booking) =>
            `event ${booking.eventId} created`,
          );

    const smsAttempt: Promise<ChannelOutcome<DeliveryReceipt>> =
      smsAdapter === null
        ? Promise.resolve(skipped('unconfigured', 'sms channel is not configured'))
        : this.attempt('sms', () => smsAdapter.sendSms(intent), (receipt) =>
            `message ${receipt.messageId} queued`,
          );

    const calendar = await calendarAttempt;
    const calendarLink =
      calendar.state === 'succeeded' && calendar.value.eventLink !== null
        ? calendar.value.eventLink
        : undefined;

    let email: ChannelOutcome<DeliveryReceipt>;
    if (intent.customerEmail === undefined) {
      email = skipped('no_recipient', 'no customer email provided');
    } else if (emailAdapter === null) {
      email = skipped('unconfigured', 'email channel is not configured');
    } else {
      email = await this.attempt(
        'email',
        () => emailAdapter.sendEmail(intent, calendarLink),
        (receipt) => `message ${receipt.messageId} accepted`,
      );
    }

    const sms = await smsAttempt;

    for (const [channel, outcome] of [
      ['calendar', calendar],
      ['sms', sms],
      ['email', email],
    ] as const) {
      if (outcome.state === 'skipped') {
        this.options.logger.debug('channel skipped', {
          channel,
          reason: outcome.reason,
          detail: outcome.detail,
        });
      }
    }

    this.options.logger.info('appointment processed', {
      calendar: calendar.state,
      sms: sms.state,
      email: email.state,
      callerPhone: intent.callerPhone,
    });

    return { intent, calendar, sms, email };
  }

  private async attempt<TValue>(
    channel: ChannelName,
    operation: () => Promise<TValue>,
    describe: (value: TValue) => string,
  ): Promise<ChannelOutcome<TValue>> {
    const startedAt = Date.now();

    try {
      const value = await withDeadline(channel, operation, this.options.channelTimeoutMs);
      const detail = describe(value);
      this.options.logger.info('channel succeeded', {
        channel,
        detail,
        durationMs: Date.now() - startedAt,
      });
      return { state: 'succeeded', attempted: true, succeeded: true, detail, value };
    } catch (error) {
      const adapterError = toAdapterError(channel, error);
      this.options.logger.warn('channel failed', {
        channel,
        code: adapterError.code,
        error: adapterError.message,
        durationMs: Date.now() - startedAt,
      });
      return {
        state: 'failed',
        attempted: true,
        succeeded: false,
        error: adapterError.message,
        errorCode: adapterError.code,
      };
    }
  }
}
