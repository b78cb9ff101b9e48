import Fastify from 'fastify';

import type { AppointmentOrchestrator } from './appointment-orchestrator.js';
import type { WebhookAuthGate } from './auth-gate.js';
import { IntakeConfig } from './config.js';
import { ERROR_CODES, IntakeError, toErrorResponse } from './errors.js';
import { Logger } from './logger.js';
import { ReadinessCheck } from './readiness.js';
import {
  getCorrelationId,
  registerAppointmentRoutes,
  registerCallBridgeRoutes,
  registerHealthRoutes,
} from './routes.js';

export interface IntakeAppDependencies {
  config: IntakeConfig;
  logger: Logger;
  orchestrator: AppointmentOrchestrator;
  authGate: WebhookAuthGate;
  readinessChecks: ReadinessCheck[];
}

export function buildIntakeApp(dependencies: IntakeAppDependencies) {
  const app = Fastify({ logger: false });

  // Twilio posts call webhooks as form data.
  app.addContentTypeParser<string>(
    'application/x-www-form-urlencoded',
    { parseAs: 'string' },
    (_request, payload, done) => {
      done(null, Object.fromEntries(new URLSearchParams(payload)));
    },
  );

  app.addHook('onRequest', async (request, reply) => {
    request.correlationId = getCorrelationId(request);
    reply.header('x-correlation-id', request.correlationId);
  });

  app.addHook('onResponse', async (request, reply) => {
    dependencies.logger.info('request complete', {
      correlationId: request.correlationId,
      method: request.method,
      path: request.routeOptions.url ?? request.url.split('?')[0] ?? request.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  app.register(async (instance) => {
    await registerHealthRoutes(instance, dependencies.readinessChecks);
    await registerAppointmentRoutes(instance, dependencies.logger, {
      orchestrator: dependencies.orchestrator,
      authGate: dependencies.authGate,
      defaultTimezone: dependencies.config.DEFAULT_TIMEZONE,
    });
    await registerCallBridgeRoutes(instance, dependencies.logger, {
      agentId: dependencies.config.VOICE_AGENT_ID,
      streamUrl: dependencies.config.VOICE_STREAM_URL,
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    const error = new IntakeError(ERROR_CODES.ROUTE_NOT_FOUND, 404, 'Route not found');
    const mapped = toErrorResponse(error);
    return reply.status(mapped.statusCode).send(mapped.body);
  });

  app.setErrorHandler((error, request, reply) => {
    const mapped = toErrorResponse(error);
    const fields = {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url.split('?')[0] ?? request.url,
      statusCode: mapped.statusCode,
      code: mapped.body.error.code,
      message: mapped.body.error.message,
    };

    if (mapped.statusCode >= 500) {
      dependencies.logger.error('request failed', {
        ...fields,
        cause: error instanceof Error ? error.message : 'Unknown error',
      });
    } else {
      dependencies.logger.warn('request rejected', fields);
    }

    return reply.status(mapped.statusCode).send(mapped.body);
  });

  return app;
}
