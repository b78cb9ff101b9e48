import { afterEach, describe, expect, it, vi } from 'vitest';

import { createIntakeServer, intakeEngineServiceName } from '../../index.js';
import { testConfig } from '../fakes.js';

describe('bootstrap and naming exports', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates the intake server with channels resolved from config', async () => {
    const server = await createIntakeServer(testConfig);

    const health = await server.app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({
      status: 'degraded',
      services: { google_calendar: false, twilio_sms: false, email: false },
    });
    await server.app.close();
  });

  it('warns at startup when no webhook secret is configured', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const server = await createIntakeServer({ ...testConfig, LOG_LEVEL: 'warn' });

    const messages = log.mock.calls.map((call) => JSON.parse(String(call[0])).message);
    expect(messages).toContain(
      'WEBHOOK_SECRET not set, appointment webhook accepts unauthenticated requests',
    );
    await server.app.close();
  });

  it('returns the service name', () => {
    expect(intakeEngineServiceName()).toBe('intake-engine');
  });
});
