import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { BridgeRequest, BridgeRequestInput } from '@resilient-bridge/types';
import type { CacheScope } from '../config';

/**
 * SHA-256 hex digest of the request content
 */
export function fingerprint(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Build an immutable request with id, timestamp and fingerprint
 */
export function createRequest(input: BridgeRequestInput, now: () => number = Date.now): BridgeRequest {
  return Object.freeze({
    id: uuidv4(),
    content: input.content,
    userId: input.userId ?? 'anonymous',
    metadata: Object.freeze({ ...input.metadata }),
    createdAt: now(),
    fingerprint: fingerprint(input.content),
  });
}

/**
 * Key under which a request's result is cached
 */
export function cacheKeyFor(request: BridgeRequest, scope: CacheScope): string {
  return scope === 'requester' ? `${request.userId}:${request.fingerprint}` : request.fingerprint;
}
