import { v4 as uuidv4 } from 'uuid';
import type { AuthAllowed, UserAuthToken } from './types.js';
import type { Clock } from '../types.js';
import { systemClock } from '../types.js';
import type { OperationError } from '../errors.js';
import type { Result } from '../result.js';
import { ok, err } from '../result.js';

export type SessionPhase = 'continue' | 'success' | 'denied';

/** Server-side record of one negotiation, keyed by its session id. */
export interface SessionRecord {
  readonly sessionid: string;
  readonly principal: string;
  readonly appid: string | null;
  phase: SessionPhase;
  /** Mechanisms still to be satisfied while in `continue`. */
  remaining: AuthAllowed[];
  token: UserAuthToken | null;
  lastActivityMs: number;
  /** Set while one step holds the session. */
  inFlight: boolean;
}

export interface SessionStoreConfig {
  clock?: Clock;
  /** Inactivity window after which a session expires. */
  ttlMs?: number;
  /** Called when an unresolved session is denied by expiry. */
  onExpired?: (sessionid: string, principal: string) => void;
}

export const DEFAULT_SESSION_TTL_MS = 300_000;

const INVALID_SESSION: OperationError = { kind: 'InvalidSessionState' };

/**
 * In-memory negotiation sessions. A session is advanced by at most one step
 * at a time: `claim` takes it, and exactly one of `advance`, `succeed` or
 * `deny` hands it back.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly clock: Clock;
  private readonly ttlMs: number;
  private readonly onExpired: (sessionid: string, principal: string) => void;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(config: SessionStoreConfig = {}) {
    this.clock = config.clock ?? systemClock;
    this.ttlMs = config.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.onExpired = config.onExpired ?? (() => undefined);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Opens a session awaiting the given mechanisms. */
  open(principal: string, appid: string | null, remaining: readonly AuthAllowed[]): SessionRecord {
    return this.insert(principal, appid, 'continue', [...remaining]);
  }

  /** Records a negotiation that was refused at its first step. */
  openDenied(principal: string, appid: string | null): SessionRecord {
    return this.insert(principal, appid, 'denied', []);
  }

  /**
   * Takes the session for one step. Unknown, expired, terminal and
   * already-claimed sessions all answer InvalidSessionState.
   */
  claim(sessionid: string): Result<SessionRecord, OperationError> {
    const session = this.live(sessionid);
    if (session === null || session.phase !== 'continue' || session.inFlight) {
      return err(INVALID_SESSION);
    }
    session.inFlight = true;
    session.lastActivityMs = this.nowMs();
    return ok(session);
  }

  /** Releases a claimed session, still negotiating. */
  advance(sessionid: string, remaining: readonly AuthAllowed[]): void {
    this.release(sessionid, (s) => {
      s.remaining = [...remaining];
    });
  }

  /** Releases a claimed session as succeeded, binding its token. */
  succeed(sessionid: string, token: UserAuthToken): void {
    this.release(sessionid, (s) => {
      s.phase = 'success';
      s.remaining = [];
      s.token = token;
    });
  }

  /** Releases a claimed session as denied. */
  deny(sessionid: string): void {
    this.release(sessionid, (s) => {
      s.phase = 'denied';
      s.remaining = [];
    });
  }

  /** The token bound to a live succeeded session; refreshes its window. */
  tokenFor(sessionid: string): UserAuthToken | null {
    const session = this.live(sessionid);
    if (session === null || session.phase !== 'success') return null;
    session.lastActivityMs = this.nowMs();
    return session.token;
  }

  /** Read-only view of a session, expiring it first if due. */
  inspect(sessionid: string): Readonly<SessionRecord> | null {
    return this.live(sessionid);
  }

  /**
   * Denies unresolved sessions past their window and forgets terminal ones
   * past theirs. Returns how many sessions changed.
   */
  sweep(): number {
    const now = this.nowMs();
    let changed = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.inFlight || now - session.lastActivityMs < this.ttlMs) continue;
      if (session.phase === 'continue') {
        this.expire(session, now);
      } else {
        this.sessions.delete(session.sessionid);
      }
      changed++;
    }
    return changed;
  }

  startSweeper(intervalMs: number = this.ttlMs): void {
    if (this.sweeper !== null) return;
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper !== null) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  private insert(
    principal: string,
    appid: string | null,
    phase: SessionPhase,
    remaining: AuthAllowed[],
  ): SessionRecord {
    const record: SessionRecord = {
      sessionid: uuidv4(),
      principal,
      appid,
      phase,
      remaining,
      token: null,
      lastActivityMs: this.nowMs(),
      inFlight: false,
    };
    this.sessions.set(record.sessionid, record);
    return record;
  }

  /** Looks a session up, denying it first when its window has passed. */
  private live(sessionid: string): SessionRecord | null {
    const session = this.sessions.get(sessionid);
    if (session === undefined) return null;
    const now = this.nowMs();
    if (!session.inFlight && now - session.lastActivityMs >= this.ttlMs) {
      if (session.phase === 'continue') {
        this.expire(session, now);
        return session;
      }
      this.sessions.delete(sessionid);
      return null;
    }
    return session;
  }

  private expire(session: SessionRecord, now: number): void {
    session.phase = 'denied';
    session.remaining = [];
    session.lastActivityMs = now;
    this.onExpired(session.sessionid, session.principal);
  }

  private release(sessionid: string, apply: (session: SessionRecord) => void): void {
    const session = this.sessions.get(sessionid);
    if (session === undefined || !session.inFlight) {
      throw new Error(`Session ${sessionid} released without being claimed`);
    }
    apply(session);
    session.inFlight = false;
    session.lastActivityMs = this.nowMs();
  }

  private nowMs(): number {
    return this.clock.now().getTime();
  }
}
