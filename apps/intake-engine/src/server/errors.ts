export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export class IntakeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'IntakeError';
  }
}

// Fastify raises plain errors with a 4xx statusCode for bodies it cannot parse
// (bad JSON, unsupported content type, oversized payload).
function getClientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return null;
  }

  const { statusCode } = error;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }

  return null;
}

export function toErrorResponse(error: unknown): {
  statusCode: number;
  body: ErrorEnvelope;
} {
  if (error instanceof IntakeError) {
    return {
      statusCode: error.statusCode,
      body: {
        error: {
          code: error.code,
          message: error.message,
          ...(error.details === undefined ? {} : { details: error.details }),
        },
      },
    };
  }

  const clientStatus = getClientErrorStatus(error);
  if (clientStatus !== null) {
    return {
      statusCode: clientStatus,
      body: {
        error: {
          code: ERROR_CODES.VALIDATION_ERROR,
          message: error instanceof Error ? error.message : 'Malformed request',
        },
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: {
        code: ERROR_CODES.INTERNAL_ERROR,
        message: 'Internal server error',
      },
    },
  };
}
