import type { BroadcastResult, PusherConnection } from '../../types/subscription.types.js';
import { getLogger } from '../../utils/logger.js';

export class SendTimeoutError extends Error {
  constructor(connectionId: string, timeoutMs: number) {
    super(`Send to ${connectionId} did not complete within ${timeoutMs}ms`);
    this.name = 'SendTimeoutError';
  }
}

function sendWithTimeout(
  connection: PusherConnection,
  message: string,
  timeoutMs: number,
): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new SendTimeoutError(connection.id, timeoutMs)), timeoutMs);
  });
  return Promise.race([connection.send(message), timeout]).finally(() => clearTimeout(timer));
}

/**
 * Sends `message` to every connection at once. Each send is bounded by its
 * own timeout and a failing or stalled connection never affects the others.
 */
export async function broadcast(
  connections: Iterable<PusherConnection>,
  message: string,
  timeoutMs: number,
): Promise<BroadcastResult> {
  const targets = Array.from(connections);
  const results = await Promise.allSettled(
    targets.map((connection) => sendWithTimeout(connection, message, timeoutMs)),
  );

  const logger = getLogger();
  let failed = 0;
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      failed += 1;
      logger.warn({ err: result.reason, connection: targets[index].id }, 'Broadcast send failed');
    }
  });

  return { delivered: targets.length - failed, failed };
}
