import type { ApplyResult } from '../apply/controller.js';

/** HTTP status for an apply outcome; `null` means nothing needed applying. */
export function applyHttpStatus(result: ApplyResult | null, okStatus = 200): number {
  if (!result) return okStatus;
  switch (result.status) {
    case 'live':
    case 'unchanged':
      return okStatus;
    case 'rejected':
      return 400;
    case 'reload-failed':
      return 502;
    case 'busy':
      return 409;
  }
}

export const ifBusyQuerySchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    ifBusy: { type: 'string', enum: ['queue', 'reject'] }
  }
} as const;

export type IfBusyQuery = { ifBusy?: 'queue' | 'reject' };

/** `:idx` path segment as a list index, or null when it is not a non-negative integer. */
export function parseIndex(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const idx = Number(raw);
  return Number.isSafeInteger(idx) ? idx : null;
}
