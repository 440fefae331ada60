import type { FastifyRequest } from 'fastify';
import type { AuthNegotiator, UserAuthToken } from 'idm-proto';
import { OperationFailure } from 'idm-proto';

const BEARER = /^Bearer\s+(\S+)\s*$/i;

/** Session id carried in `Authorization: Bearer <id>`, if any. */
export function bearerSession(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (header === undefined) return null;
  return BEARER.exec(header)?.[1] ?? null;
}

/** The token of the caller's succeeded session; NotAuthenticated otherwise. */
export function requireToken(request: FastifyRequest, negotiator: AuthNegotiator): UserAuthToken {
  const sessionid = bearerSession(request);
  const token = sessionid === null ? null : negotiator.tokenFor(sessionid);
  if (token === null) throw new OperationFailure({ kind: 'NotAuthenticated' });
  return token;
}
