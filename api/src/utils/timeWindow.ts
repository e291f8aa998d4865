import { BadRequestError } from '@/errors/apiErrors';
import type { TimeWindow } from '@/types/models';

export const DEFAULT_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Fill in a missing bound: `before` defaults to now, `after` to one week before `before`
 */
export function resolveTimeWindow(
  query: { after?: Date; before?: Date },
  now: Date = new Date()
): TimeWindow {
  const before = query.before ?? now;
  const after = query.after ?? new Date(before.getTime() - DEFAULT_WINDOW_MS);

  if (after.getTime() >= before.getTime()) {
    throw new BadRequestError('Time window "after" must be earlier than "before"', {
      after: after.toISOString(),
      before: before.toISOString(),
    });
  }

  return { after, before };
}
