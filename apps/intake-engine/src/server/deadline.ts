import type { ChannelName } from '@voice-intake/shared';
import { ADAPTER_ERROR_CODES, AdapterError } from '@voice-intake/integrations';

/**
 * Settles with the operation, or rejects with a TIMEOUT adapter error once
 * `timeoutMs` elapses. The operation itself is not cancelled.
 */
export function withDeadline<T>(
  channel: ChannelName,
  operation: () => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new AdapterError(
          channel,
          ADAPTER_ERROR_CODES.TIMEOUT,
          `${channel} channel timed out after ${timeoutMs}ms`,
        ),
      );
    }, timeoutMs);

    Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
  });
}
