import type { PageRequest } from '@visitor-kiosk/core';

export const DEFAULT_SKIP = 0;
export const DEFAULT_LIMIT = 25;
export const MAX_LIMIT = 100;

export interface PageQuery {
  skip?: string;
  limit?: string;
}

const DIGITS_RE = /^\d+$/;

// Plain digits only ("1e20" and "-3" fall back); capped at MAX_SAFE_INTEGER
function toInt(value: string | undefined, fallback: number): number {
  const trimmed = value?.trim();
  if (!trimmed || !DIGITS_RE.test(trimmed)) return fallback;
  return Math.min(Number(trimmed), Number.MAX_SAFE_INTEGER);
}

/** Parse `?skip&limit`: skip is at least 0, limit is kept within 1..100. */
export function parsePage(query: PageQuery): PageRequest {
  const skip = Math.max(0, toInt(query.skip, DEFAULT_SKIP));
  const limit = Math.min(MAX_LIMIT, Math.max(1, toInt(query.limit, DEFAULT_LIMIT)));
  return { skip, limit };
}
