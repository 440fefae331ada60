import type { AuthAllowed, AuthCredential, AuthResponse, AuthStep, UserAuthToken } from './types.js';
import { AUTH_MECHANISMS, DENIED_REASON } from './types.js';
import type { SessionStore } from './session-store.js';
import type { CredentialVerifier } from '../types.js';
import type { OperationError } from '../errors.js';
import type { Result } from '../result.js';
import { ok, err } from '../result.js';

export interface AuthNegotiatorConfig {
  verifier: CredentialVerifier;
  sessions: SessionStore;
}

/** Mechanisms in their declared order, without repeats. */
function normalizeMechanisms(mechanisms: readonly AuthAllowed[]): AuthAllowed[] {
  return AUTH_MECHANISMS.filter((m) => mechanisms.includes(m));
}

/**
 * Drives the stepwise authentication exchange.
 *
 * Init opens a session and answers Continue (or Denied for an unknown or
 * locked principal). Each Creds step on a Continue session either narrows
 * the remaining mechanisms, issues the token, or denies. A session that has
 * reached Success or Denied never moves again: further steps answer
 * InvalidSessionState. Denials never say which check failed.
 */
export class AuthNegotiator {
  constructor(private readonly config: AuthNegotiatorConfig) {}

  async step(sessionid: string | null, step: AuthStep): Promise<Result<AuthResponse, OperationError>> {
    if (step.kind === 'Init') {
      return ok(await this.init(step.name, step.appid));
    }
    if (sessionid === null) {
      return err({ kind: 'InvalidSessionState' });
    }
    return this.creds(sessionid, step.creds);
  }

  /** Token bound to a live succeeded session, if any. */
  tokenFor(sessionid: string): UserAuthToken | null {
    return this.config.sessions.tokenFor(sessionid);
  }

  private async init(principal: string, appid: string | null): Promise<AuthResponse> {
    const { verifier, sessions } = this.config;
    const required = await verifier.requiredMechanisms(principal, appid);
    const mechanisms = required === null ? [] : normalizeMechanisms(required);

    if (mechanisms.length === 0) {
      const denied = sessions.openDenied(principal, appid);
      return { sessionid: denied.sessionid, state: { kind: 'Denied', reason: DENIED_REASON } };
    }

    const session = sessions.open(principal, appid, mechanisms);
    return { sessionid: session.sessionid, state: { kind: 'Continue', allowed: mechanisms } };
  }

  private async creds(
    sessionid: string,
    creds: readonly AuthCredential[],
  ): Promise<Result<AuthResponse, OperationError>> {
    const { verifier, sessions } = this.config;
    const claimed = sessions.claim(sessionid);
    if (!claimed.ok) return claimed;
    const session = claimed.value;

    const denied = (): Result<AuthResponse, OperationError> => {
      sessions.deny(sessionid);
      return ok({ sessionid, state: { kind: 'Denied', reason: DENIED_REASON } });
    };

    try {
      const supplied = creds.map((c) => c.kind);
      const distinct = new Set(supplied);
      if (
        supplied.length === 0 ||
        distinct.size !== supplied.length ||
        supplied.some((m) => !session.remaining.includes(m))
      ) {
        return denied();
      }

      if (!(await verifier.verify(session.principal, creds))) {
        return denied();
      }

      const remaining = session.remaining.filter((m) => !distinct.has(m));
      if (remaining.length > 0) {
        sessions.advance(sessionid, remaining);
        return ok({ sessionid, state: { kind: 'Continue', allowed: remaining } });
      }

      const token = await verifier.userToken(session.principal, session.appid);
      if (token === null) {
        return denied();
      }
      sessions.succeed(sessionid, token);
      return ok({ sessionid, state: { kind: 'Success', token } });
    } catch (e) {
      // A failed collaborator ends the negotiation; the step is not retried
      if (session.inFlight) sessions.deny(sessionid);
      throw e;
    }
  }
}
