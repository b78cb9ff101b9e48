import { CHANNEL_NAMES, ChannelName } from '@voice-intake/shared';

import type { ChannelAvailability } from './channels.js';

export interface ReadinessCheck {
  name: string;
  run(): Promise<'up' | 'down'>;
}

const serviceNames: Record<ChannelName, string> = {
  calendar: 'google_calendar',
  sms: 'twilio_sms',
  email: 'email',
};

// Health here is configuration state only; no provider is called.
export function createChannelReadinessChecks(availability: ChannelAvailability): ReadinessCheck[] {
  return CHANNEL_NAMES.map((channel) => ({
    name: serviceNames[channel],
    async run() {
      return availability[channel] ? 'up' : 'down';
    },
  }));
}
