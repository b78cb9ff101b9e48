import { describe, expect, it } from 'vitest';

import { appointmentWebhookResponseSchema } from '@voice-intake/shared';

import { buildIntakeApp } from '../../server/app.js';
import { AppointmentOrchestrator, IntakeChannels } from '../../server/appointment-orchestrator.js';
import { WebhookAuthGate } from '../../server/auth-gate.js';
import { IntakeConfig } from '../../server/config.js';
import { createChannelReadinessChecks } from '../../server/readiness.js';
import { fakeCalendar, fakeEmail, fakeSms, RecordingLogger, testConfig } from '../fakes.js';

interface AppOptions {
  webhookSecret?: string;
  channels?: Partial<IntakeChannels>;
  config?: Partial<IntakeConfig>;
}

async function createApp(options: AppOptions = {}) {
  const calendar = fakeCalendar();
  const sms = fakeSms();
  const email = fakeEmail();
  const channels: IntakeChannels = {
    calendar: calendar.adapter,
    sms: sms.adapter,
    email: email.adapter,
    ...options.channels,
  };
  const config: IntakeConfig = {
    ...testConfig,
    ...options.config,
    ...(options.webhookSecret === undefined ? {} : { WEBHOOK_SECRET: options.webhookSecret }),
  };
  const logger = new RecordingLogger();

  const app = buildIntakeApp({
    config,
    logger,
    orchestrator: new AppointmentOrchestrator({
      channels,
      logger,
      channelTimeoutMs: config.CHANNEL_TIMEOUT_MS,
    }),
    authGate: new WebhookAuthGate(config.WEBHOOK_SECRET),
    readinessChecks: createChannelReadinessChecks({
      calendar: channels.calendar !== null,
      sms: channels.sms !== null,
      email: channels.email !== null,
    }),
  });

  await app.ready();
  return { app, logger, calendar, sms, email };
}

const validPayload = {
  caller: '+14155550123',
  callback_time: '2025-12-08T15:00:00-08:00',
  email: 'a@b.com',
};

describe('appointment webhook', () => {
  it('books, texts and emails for a valid payload', async () => {
    const { app } = await createApp();

    const response = await app.inject({ method: 'POST', url: '/webhook', payload: validPayload });

    expect(response.statusCode).toBe(200);
    expect(appointmentWebhookResponseSchema.safeParse(response.json()).success).toBe(true);
    expect(response.json()).toEqual({
      status: 'success',
      message: 'Appointment processed successfully',
      data: {
        calendar_created: true,
        sms_sent: true,
        email_sent: true,
        calendar_event_id: 'evt-1',
        calendar_link: 'https://calendar.example/evt-1',
      },
      channels: {
        calendar: {
          attempted: true,
          succeeded: true,
          detail: 'event evt-1 created',
          error: null,
        },
        sms: { attempted: true, succeeded: true, detail: 'message SM-1 queued', error: null },
        email: {
          attempted: true,
          succeeded: true,
          detail: 'message <msg-1@example.com> accepted',
          error: null,
        },
      },
      customer: { name: 'Customer', phone: '+14155550123', email: 'a@b.com' },
      appointment_time: '2025-12-08T15:00:00-08:00',
    });
    await app.close();
  });

  it('serves the same handler under the versioned path', async () => {
    const { app } = await createApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/webhooks/appointments',
      payload: validPayload,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('success');
    await app.close();
  });

  it('reports sms as not attempted when it is unconfigured', async () => {
    const { app, calendar, email } = await createApp({ channels: { sms: null } });

    const response = await app.inject({ method: 'POST', url: '/webhook', payload: validPayload });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('success');
    expect(body.data).toMatchObject({ calendar_created: true, sms_sent: false, email_sent: true });
    expect(body.channels.sms).toEqual({
      attempted: false,
      succeeded: false,
      detail: 'sms channel is not configured',
      error: null,
    });
    expect(calendar.createEvent).toHaveBeenCalledTimes(1);
    expect(email.sendEmail).toHaveBeenCalledTimes(1);
    await app.close();
  });

  it('returns a partial result when the calendar fails', async () => {
    const { app, sms, email } = await createApp({
      channels: {
        calendar: {
          async createEvent() {
            throw Object.assign(new Error('Forbidden'), { status: 403 });
          },
        },
      },
    });

    const response = await app.inject({ method: 'POST', url: '/webhook', payload: validPayload });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('partial');
    expect(body.message).toBe('Appointment processed with channel failures');
    expect(body.data).toMatchObject({
      calendar_created: false,
      sms_sent: true,
      email_sent: true,
      calendar_event_id: null,
      calendar_link: null,
    });
    expect(body.channels.calendar).toEqual({
      attempted: true,
      succeeded: false,
      detail: null,
      error: 'Forbidden',
    });
    expect(sms.sendSms).toHaveBeenCalledTimes(1);
    expect(email.sendEmail).toHaveBeenCalledWith(expect.anything(), undefined);
    await app.close();
  });

  it('skips email when the caller gave no address', async () => {
    const { app, email } = await createApp();

    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      payload: { caller: validPayload.caller, callback_time: validPayload.callback_time },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.channels.email).toEqual({
      attempted: false,
      succeeded: false,
      detail: 'no customer email provided',
      error: null,
    });
    expect(body.customer.email).toBeNull();
    expect(body.data.calendar_created).toBe(true);
    expect(body.data.sms_sent).toBe(true);
    expect(email.sendEmail).not.toHaveBeenCalled();
    await app.close();
  });

  it('reads an offset-less callback time in the default timezone', async () => {
    const { app } = await createApp({ config: { DEFAULT_TIMEZONE: 'America/Chicago' } });

    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      payload: { caller: validPayload.caller, callback_time: '2025-12-08T15:00:00' },
    });

    expect(response.json().appointment_time).toBe('2025-12-08T15:00:00-06:00');
    await app.close();
  });

  it.each([
    [{ ...validPayload, caller: '555-0123' }, 'caller_phone', 'caller must contain at least 10 digits'],
    [{ ...validPayload, callback_time: 'tomorrow' }, 'callback_time', 'callback_time must be a valid ISO 8601 datetime'],
    [{ caller: validPayload.caller }, 'callback_time', 'callback_time is required'],
    [{ ...validPayload, email: 'a@b' }, 'email', 'email must be a valid email address'],
  ])('rejects an invalid payload naming the field', async (payload, field, message) => {
    const { app, calendar, sms } = await createApp();

    const response = await app.inject({ method: 'POST', url: '/webhook', payload });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: { code: 'VALIDATION_ERROR', message, details: { field } },
    });
    expect(calendar.createEvent).not.toHaveBeenCalled();
    expect(sms.sendSms).not.toHaveBeenCalled();
    await app.close();
  });

  it('rejects malformed JSON with the error envelope', async () => {
    const { app } = await createApp();

    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json' },
      payload: '{"caller": ',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe('VALIDATION_ERROR');
    await app.close();
  });
});

describe('webhook authentication', () => {
  it('rejects a missing secret before any channel runs', async () => {
    const { app, calendar, sms, email } = await createApp({ webhookSecret: 'test-secret' });

    const response = await app.inject({ method: 'POST', url: '/webhook', payload: validPayload });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      error: { code: 'AUTHENTICATION_FAILED', message: 'Missing webhook secret' },
    });
    expect(calendar.createEvent).not.toHaveBeenCalled();
    expect(sms.sendSms).not.toHaveBeenCalled();
    expect(email.sendEmail).not.toHaveBeenCalled();
    await app.close();
  });

  it('rejects a wrong secret', async () => {
    const { app, calendar } = await createApp({ webhookSecret: 'test-secret' });

    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'x-webhook-secret': 'wrong-secret' },
      payload: validPayload,
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.message).toBe('Invalid webhook secret');
    expect(calendar.createEvent).not.toHaveBeenCalled();
    await app.close();
  });

  it('rejects an unauthenticated request before reading its body', async () => {
    const { app, calendar } = await createApp({ webhookSecret: 'test-secret' });

    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json', 'x-correlation-id': 'corr-2' },
      payload: '{"caller": ',
    });

    expect(response.statusCode).toBe(403);
    expect(response.headers['x-correlation-id']).toBe('corr-2');
    expect(response.json()).toEqual({
      error: { code: 'AUTHENTICATION_FAILED', message: 'Missing webhook secret' },
    });
    expect(calendar.createEvent).not.toHaveBeenCalled();
    await app.close();
  });

  it('accepts the secret from the header or the query string', async () => {
    const { app } = await createApp({ webhookSecret: 'test-secret' });

    const viaHeader = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'x-webhook-secret': 'test-secret' },
      payload: validPayload,
    });
    const viaQuery = await app.inject({
      method: 'POST',
      url: '/webhook?secret=test-secret',
      payload: validPayload,
    });

    expect(viaHeader.statusCode).toBe(200);
    expect(viaQuery.statusCode).toBe(200);
    await app.close();
  });

  it('prefers the header over the query string', async () => {
    const { app } = await createApp({ webhookSecret: 'test-secret' });

    const response = await app.inject({
      method: 'POST',
      url: '/webhook?secret=test-secret',
      headers: { 'x-webhook-secret': 'wrong-secret' },
      payload: validPayload,
    });

    expect(response.statusCode).toBe(403);
    await app.close();
  });

  it('keeps the secret out of the request log', async () => {
    const { app, logger } = await createApp({ webhookSecret: 'test-secret' });

    await app.inject({ method: 'POST', url: '/webhook?secret=test-secret', payload: validPayload });

    const complete = logger.entries.find((entry) => entry.message === 'request complete');
    expect(complete?.fields.path).toBe('/webhook');
    expect(complete?.fields.statusCode).toBe(200);
    await app.close();
  });
});

describe('service routes', () => {
  it('describes the service at the root', async () => {
    const { app } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.json()).toEqual({
      service: 'intake-engine',
      version: '1.0.0',
      status: 'operational',
      endpoints: { health: '/health', webhook: '/webhook', voice: '/voice/inbound' },
    });
    await app.close();
  });

  it('reports healthy when every channel is configured', async () => {
    const { app } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'healthy',
      timestamp: expect.any(String),
      services: { google_calendar: true, twilio_sms: true, email: true },
    });
    await app.close();
  });

  it('reports degraded with a 200 when a channel is missing', async () => {
    const { app } = await createApp({ channels: { email: null } });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'degraded',
      services: { google_calendar: true, twilio_sms: true, email: false },
    });
    await app.close();
  });

  it('echoes the correlation id and answers unknown routes with the envelope', async () => {
    const { app } = await createApp();

    const response = await app.inject({
      method: 'GET',
      url: '/v1/unknown',
      headers: { 'x-correlation-id': 'corr-1' },
    });

    expect(response.statusCode).toBe(404);
    expect(response.headers['x-correlation-id']).toBe('corr-1');
    expect(response.json()).toEqual({
      error: { code: 'ROUTE_NOT_FOUND', message: 'Route not found' },
    });
    await app.close();
  });
});

describe('inbound call bridge', () => {
  const form = 'From=%2B14155550123&To=%2B15550001111&CallSid=CA-test-1';

  it('connects the call to the voice agent stream', async () => {
    const { app } = await createApp({ config: { VOICE_AGENT_ID: 'agent-1' } });

    const response = await app.inject({
      method: 'POST',
      url: '/voice/inbound',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: form,
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/xml/);
    expect(response.body).toContain(
      '<Stream url="wss://agent.example.com/v1/conversation?agent_id=agent-1">',
    );
    expect(response.body).toContain('<Parameter name="caller_number" value="+14155550123"/>');
    expect(response.body).toContain('<Parameter name="call_sid" value="CA-test-1"/>');
    await app.close();
  });

  it('apologises and hangs up without an agent', async () => {
    const { app } = await createApp();

    const response = await app.inject({
      method: 'POST',
      url: '/voice/inbound',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: form,
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('<Hangup/>');
    expect(response.body).not.toContain('<Connect>');
    await app.close();
  });
});
