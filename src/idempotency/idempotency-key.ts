import { createHash } from 'crypto';

export const IDEMPOTENCY_HEADER = 'x-idempotency-key';
export const IDEMPOTENT_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH']);

export interface CachedResponse {
  statusCode: number;
  body: unknown;
}

/** `request:<sha256(method + path + body + key)>` */
export const idempotencyCacheKey = (
  method: string,
  path: string,
  body: unknown,
  idempotencyKey: string,
): string => {
  const hash = createHash('sha256')
    .update(method)
    .update(path)
    .update(JSON.stringify(body ?? {}))
    .update(idempotencyKey)
    .digest('hex');

  return `request:${hash}`;
};
