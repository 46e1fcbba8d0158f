/**
 * HTTP status codes for error-shaped pipeline results.
 */

import type { ErrorCategory, NormalizedPayload } from '../types/models.js';

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  EMPTY_INPUT: 400,
  SYNTAX: 400,
  DESTRUCTIVE_OPERATION: 400,
  MODEL_FAILURE: 502,
  DATABASE_FAILURE: 500,
};

export function statusForCategory(category: ErrorCategory | null): number {
  return category === null ? 200 : STATUS_BY_CATEGORY[category];
}

export function statusForPayload(payload: NormalizedPayload): number {
  return payload.status === 'error' ? statusForCategory(payload.category) : 200;
}
