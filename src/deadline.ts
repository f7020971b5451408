import type { Context } from 'aws-lambda';
import type { Clock } from './clock';
import { OrderingError } from './errors';

// Head-room left for the response once the core returns.
const RESPONSE_MARGIN_MS = 250;

/**
 * Throws DEADLINE_EXCEEDED when `deadline` (epoch ms) has passed. Called only
 * before a commit write: once the write is issued the operation completes.
 */
export function assertWithinDeadline(deadline: number | undefined, clock: Clock, step: string): void {
  if (deadline === undefined) return;
  const now = clock.now().getTime();
  if (now >= deadline) {
    throw new OrderingError('DEADLINE_EXCEEDED', `Deadline exceeded before ${step}`, {
      step,
      overrunMs: now - deadline,
    });
  }
}

/** Absolute deadline for a Lambda invocation, capped by the configured request timeout. */
export function deadlineFor(
  context: Pick<Context, 'getRemainingTimeInMillis'>,
  requestTimeoutMs: number,
  clock: Clock,
): number {
  const remaining = context.getRemainingTimeInMillis() - RESPONSE_MARGIN_MS;
  return clock.now().getTime() + Math.max(0, Math.min(remaining, requestTimeoutMs));
}
