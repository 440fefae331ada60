import { describe, it, expect, vi, afterEach } from 'vitest';
import { SessionStore } from '../../src/auth/session-store.js';
import type { UserAuthToken } from '../../src/auth/types.js';
import type { Clock } from '../../src/types.js';

function fakeClock(start = Date.parse('2026-01-01T00:00:00Z')) {
  let now = start;
  const clock: Clock = { now: () => new Date(now) };
  return {
    clock,
    advance(ms: number) {
      now += ms;
    },
  };
}

const token: UserAuthToken = {
  name: 'alice',
  displayname: 'alice',
  uuid: 'u-alice',
  application: null,
  groups: [],
  claims: [],
};

describe('SessionStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens sessions under distinct uuid v4 ids', () => {
    const store = new SessionStore();
    const a = store.open('alice', null, ['Password']);
    const b = store.open('alice', null, ['Password']);
    expect(a.sessionid).not.toBe(b.sessionid);
    expect(a.sessionid).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(store.size).toBe(2);
  });

  it('lets only one step claim a session at a time', () => {
    const store = new SessionStore();
    const { sessionid } = store.open('alice', null, ['Password']);
    expect(store.claim(sessionid).ok).toBe(true);
    expect(store.claim(sessionid)).toEqual({ ok: false, error: { kind: 'InvalidSessionState' } });
    store.advance(sessionid, ['Password']);
    expect(store.claim(sessionid).ok).toBe(true);
  });

  it('refuses to claim unknown and terminal sessions', () => {
    const store = new SessionStore();
    expect(store.claim('no-such-session').ok).toBe(false);

    const denied = store.openDenied('bob', null);
    expect(store.claim(denied.sessionid).ok).toBe(false);

    const { sessionid } = store.open('alice', null, ['Anonymous']);
    store.claim(sessionid);
    store.succeed(sessionid, token);
    expect(store.claim(sessionid).ok).toBe(false);
    expect(store.inspect(sessionid)?.phase).toBe('success');
  });

  it('throws when releasing a session that was not claimed', () => {
    const store = new SessionStore();
    const { sessionid } = store.open('alice', null, ['Anonymous']);
    expect(() => store.deny(sessionid)).toThrow(/released without being claimed/);
  });

  it('hands out the token only for a succeeded session', () => {
    const store = new SessionStore();
    const { sessionid } = store.open('alice', null, ['Anonymous']);
    expect(store.tokenFor(sessionid)).toBeNull();
    store.claim(sessionid);
    store.succeed(sessionid, token);
    expect(store.tokenFor(sessionid)).toEqual(token);
    expect(store.tokenFor('other')).toBeNull();
  });

  it('denies an unresolved session once its window passes', () => {
    const { clock, advance } = fakeClock();
    const onExpired = vi.fn();
    const store = new SessionStore({ clock, ttlMs: 1000, onExpired });
    const { sessionid } = store.open('alice', null, ['Password']);

    advance(999);
    expect(store.inspect(sessionid)?.phase).toBe('continue');
    advance(1);
    expect(store.claim(sessionid)).toEqual({ ok: false, error: { kind: 'InvalidSessionState' } });
    expect(store.inspect(sessionid)?.phase).toBe('denied');
    expect(onExpired).toHaveBeenCalledWith(sessionid, 'alice');
  });

  it('activity refreshes the window', () => {
    const { clock, advance } = fakeClock();
    const store = new SessionStore({ clock, ttlMs: 1000 });
    const { sessionid } = store.open('alice', null, ['Anonymous']);
    store.claim(sessionid);
    store.succeed(sessionid, token);

    advance(800);
    expect(store.tokenFor(sessionid)).toEqual(token);
    advance(800);
    expect(store.tokenFor(sessionid)).toEqual(token);
    advance(1000);
    expect(store.tokenFor(sessionid)).toBeNull();
    expect(store.inspect(sessionid)).toBeNull();
  });

  it('sweep denies stale unresolved sessions and forgets stale terminal ones', () => {
    const { clock, advance } = fakeClock();
    const onExpired = vi.fn();
    const store = new SessionStore({ clock, ttlMs: 1000, onExpired });
    const pending = store.open('alice', null, ['Password']);
    store.openDenied('bob', null);
    const claimed = store.open('carol', null, ['Password']);
    store.claim(claimed.sessionid);

    advance(1000);
    expect(store.sweep()).toBe(2);
    expect(store.inspect(pending.sessionid)?.phase).toBe('denied');
    expect(store.size).toBe(2);
    expect(onExpired).toHaveBeenCalledTimes(1);

    advance(1000);
    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
  });

  it('startSweeper runs sweep on a timer until stopped', () => {
    vi.useFakeTimers();
    const store = new SessionStore({ ttlMs: 1000 });
    const sweep = vi.spyOn(store, 'sweep');
    store.startSweeper(500);
    vi.advanceTimersByTime(1500);
    expect(sweep).toHaveBeenCalledTimes(3);
    store.stop();
    vi.advanceTimersByTime(1500);
    expect(sweep).toHaveBeenCalledTimes(3);
  });
});
