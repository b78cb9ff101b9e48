import { DateTime } from 'luxon';

import type { AppointmentIntent } from '@voice-intake/shared';

export function buildIntent(overrides: Partial<AppointmentIntent> = {}): AppointmentIntent {
  return {
    callerPhone: '+14155550123',
    customerName: 'Jane Smith',
    summary: 'Consultation about the premium package',
    transcript: 'Hi, I would like to book a call.',
    intentLabel: 'appointment',
    scheduledAt: DateTime.fromISO('2025-12-08T15:00:00-08:00', { setZone: true }),
    customerEmail: 'jane@example.com',
    ...overrides,
  };
}
