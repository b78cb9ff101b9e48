import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { buildIntakeApp } from './server/app.js';
import { AppointmentOrchestrator } from './server/appointment-orchestrator.js';
import { WebhookAuthGate } from './server/auth-gate.js';
import { createIntakeChannels, resolveChannelAvailability } from './server/channels.js';
import { IntakeConfig, loadIntakeConfig } from './server/config.js';
import { createLogger } from './server/logger.js';
import { createChannelReadinessChecks } from './server/readiness.js';

export function intakeEngineServiceName(): string {
  return 'intake-engine';
}

export async function createIntakeServer(config: IntakeConfig = loadIntakeConfig()) {
  const logger = createLogger({ service: intakeEngineServiceName(), level: config.LOG_LEVEL });

  const authGate = new WebhookAuthGate(config.WEBHOOK_SECRET);
  if (!authGate.enforcing) {
    logger.warn('WEBHOOK_SECRET not set, appointment webhook accepts unauthenticated requests');
  }

  const orchestrator = new AppointmentOrchestrator({
    channels: createIntakeChannels(config, logger),
    logger,
    channelTimeoutMs: config.CHANNEL_TIMEOUT_MS,
  });

  const app = buildIntakeApp({
    config,
    logger,
    orchestrator,
    authGate,
    readinessChecks: createChannelReadinessChecks(resolveChannelAvailability(config)),
  });

  return { app, config, logger };
}

export async function startIntakeServer(): Promise<void> {
  const { app, config, logger } = await createIntakeServer();

  try {
    await app.listen({ host: config.HOST, port: config.PORT });
    logger.info('intake-engine started', {
      host: config.HOST,
      port: config.PORT,
      env: config.NODE_ENV,
      defaultTimezone: config.DEFAULT_TIMEZONE,
    });
  } catch (error) {
    logger.error('intake-engine failed to start', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    process.exitCode = 1;
    throw error;
  }
}

const executedDirectly =
  process.argv[1] !== undefined && fileURLToPath(import.meta.url) === resolve(process.argv[1]);

if (executedDirectly) {
  startIntakeServer().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
