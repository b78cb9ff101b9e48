import type { FastifyRequest } from 'fastify';

import { pickSharedSecret, secretsMatch } from '@voice-intake/integrations';

import { ERROR_CODES, IntakeError } from './errors.js';

export const WEBHOOK_SECRET_HEADER = 'x-webhook-secret';
export const WEBHOOK_SECRET_QUERY_PARAM = 'secret';

export type AdmissionDecision = { admitted: true } | { admitted: false; reason: 'missing' | 'mismatch' };

export class WebhookAuthGate {
  constructor(private readonly configuredSecret: string | undefined) {}

  get enforcing(): boolean {
    return this.configuredSecret !== undefined;
  }

  decide(candidate: string | null): AdmissionDecision {
    if (this.configuredSecret === undefined) {
      return { admitted: true };
    }
    if (candidate === null) {
      return { admitted: false, reason: 'missing' };
    }

    return secretsMatch(candidate, this.configuredSecret)
      ? { admitted: true }
      : { admitted: false, reason: 'mismatch' };
  }

  /**
   * Throws an AUTHENTICATION_FAILED error when the request carries no secret
   * or the wrong one. The header wins over the query parameter.
   */
  assertAdmitted(request: FastifyRequest): void {
    const query = request.query;
    const queryValue =
      typeof query === 'object' && query !== null && WEBHOOK_SECRET_QUERY_PARAM in query
        ? query[WEBHOOK_SECRET_QUERY_PARAM]
        : undefined;
    const candidate = pickSharedSecret(request.headers[WEBHOOK_SECRET_HEADER], queryValue);

    const decision = this.decide(candidate);
    if (!decision.admitted) {
      throw new IntakeError(
        ERROR_CODES.AUTHENTICATION_FAILED,
        403,
        decision.reason === 'missing' ? 'Missing webhook secret' : 'Invalid webhook secret',
      );
    }
  }
}
