import type { IncomingHttpHeaders } from 'node:http';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';

export const CALLER_HEADER = 'x-account-address';

/**
 * Acting account for a request. Authentication happens upstream; the gateway forwards the
 * authenticated address in this header.
 */
export const resolveCaller = (headers: IncomingHttpHeaders): string => {
  const raw = headers[CALLER_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;

  if (!value || !value.trim()) {
    throw new DomainError(ErrorCode.Unauthorized, 401, `Missing ${CALLER_HEADER} header.`);
  }

  return value.trim();
};
