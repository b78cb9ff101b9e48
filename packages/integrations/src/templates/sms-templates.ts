import type { AppointmentIntent } from '@voice-intake/shared';

import { formatSmsDateTime } from './formatting.js';

export interface SmsTemplateOptions {
  businessName: string;
  displayTimezone: string;
}

export function buildSmsConfirmation(
  intent: AppointmentIntent,
  options: SmsTemplateOptions,
): string {
  const when = formatSmsDateTime(intent.scheduledAt, options.displayTimezone);

  return [
    `Hi ${intent.customerName}!`,
    '',
    `Your appointment has been confirmed for ${when}.`,
    '',
    `Details: ${intent.summary}`,
    '',
    'Reply CONFIRM to acknowledge or call us if you need to reschedule.',
    '',
    `- The ${options.businessName} team`,
  ].join('\n');
}
