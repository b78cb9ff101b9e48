import { randomUUID } from 'node:crypto';

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { buildVoiceBridgeTwiml, parseInboundCall } from '@voice-intake/integrations';
import { buildAppointmentWebhookResponse } from '@voice-intake/shared';

import { normalizeAppointmentIntent } from '../data/intent-normalizer.js';
import type { AppointmentOrchestrator } from './appointment-orchestrator.js';
import type { WebhookAuthGate } from './auth-gate.js';
import { ERROR_CODES, IntakeError } from './errors.js';
import type { Logger } from './logger.js';
import type { ReadinessCheck } from './readiness.js';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export const SERVICE_NAME = 'intake-engine';
export const SERVICE_VERSION = '1.0.0';

export const APPOINTMENT_WEBHOOK_PATHS = ['/webhook', '/api/v1/webhooks/appointments'] as const;

export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers['x-correlation-id'];
  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  return randomUUID();
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  readinessChecks: ReadinessCheck[],
): Promise<void> {
  app.get('/', async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'operational',
    endpoints: {
      health: '/health',
      webhook: APPOINTMENT_WEBHOOK_PATHS[0],
      voice: '/voice/inbound',
    },
  }));

  const healthHandler = async (_request: FastifyRequest, reply: FastifyReply) => {
    const checks = await Promise.all(
      readinessChecks.map(async (check) => ({ name: check.name, status: await check.run() })),
    );

    const services = Object.fromEntries(checks.map((check) => [check.name, check.status === 'up']));
    const allChecksUp = checks.every((check) => check.status === 'up');

    return reply.status(200).send({
      status: allChecksUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services,
    });
  };

  app.get('/health', healthHandler);
  app.get('/api/v1/health', healthHandler);
}

interface AppointmentRouteDependencies {
  orchestrator: AppointmentOrchestrator;
  authGate: WebhookAuthGate;
  defaultTimezone: string;
}

export async function registerAppointmentRoutes(
  app: FastifyInstance,
  logger: Logger,
  dependencies: AppointmentRouteDependencies,
): Promise<void> {
  // Runs before the body is parsed, so unauthenticated bodies are never read.
  const admit = async (request: FastifyRequest) => {
    dependencies.authGate.assertAdmitted(request);
  };

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const requestLogger = logger.child({ correlationId: request.correlationId });
    const normalized = normalizeAppointmentIntent(request.body, {
      defaultTimezone: dependencies.defaultTimezone,
    });

    if (!normalized.success) {
      requestLogger.warn('appointment payload rejected', {
        field: normalized.error.field,
        reason: normalized.error.message,
      });
      throw new IntakeError(ERROR_CODES.VALIDATION_ERROR, 400, normalized.error.message, {
        field: normalized.error.field,
      });
    }

    const { intent } = normalized;
    requestLogger.info('appointment intent accepted', {
      callerPhone: intent.callerPhone,
      scheduledAt: intent.scheduledAt.toISO(),
      hasEmail: intent.customerEmail !== undefined,
    });

    const result = await dependencies.orchestrator.process(intent);
    return reply.status(200).send(buildAppointmentWebhookResponse(result));
  };

  for (const path of APPOINTMENT_WEBHOOK_PATHS) {
    app.post(path, { onRequest: admit }, handler);
  }
}

export interface CallBridgeRouteOptions {
  agentId: string | undefined;
  streamUrl: string;
}

function isFormBody(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function registerCallBridgeRoutes(
  app: FastifyInstance,
  logger: Logger,
  options: CallBridgeRouteOptions,
): Promise<void> {
  app.post('/voice/inbound', async (request, reply) => {
    const call = parseInboundCall(isFormBody(request.body) ? request.body : {});

    logger.info('inbound call bridged', {
      correlationId: request.correlationId,
      callSid: call.callSid,
      from: call.from,
      agentConfigured: options.agentId !== undefined,
    });

    return reply.type('text/xml').status(200).send(buildVoiceBridgeTwiml(call, options));
  });
}
