import { createHash, timingSafeEqual } from 'node:crypto';
import type {
  Application,
  AuthAllowed,
  AuthCredential,
  CredentialVerifier,
  Entry,
  EntryStore,
  Filter,
  Group,
  UserAuthToken,
} from 'idm-proto';
import { OperationFailure, canonicalize, entryFirstValue, entryHasValue, entryValues, filter } from 'idm-proto';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/** Compares two secrets without leaking where they differ. */
export function secretsEqual(stored: string, supplied: string): boolean {
  return timingSafeEqual(digest(stored), digest(supplied));
}

/**
 * Credential checks backed by directory entries.
 *
 * A principal is the single live entry whose `name` matches. It is refused
 * outright when it carries `account_locked`. Entries holding a `password`
 * require Password, all others Anonymous.
 */
export class EntryCredentialVerifier implements CredentialVerifier {
  constructor(private readonly store: EntryStore) {}

  async requiredMechanisms(principal: string, appid: string | null): Promise<AuthAllowed[] | null> {
    const account = await this.account(principal);
    if (account === null || account.attrs.has('account_locked')) return null;
    if (appid !== null && (await this.application(appid)) === null) return null;
    return account.attrs.has('password') ? ['Password'] : ['Anonymous'];
  }

  async verify(principal: string, credentials: readonly AuthCredential[]): Promise<boolean> {
    const account = await this.account(principal);
    if (account === null || account.attrs.has('account_locked')) return false;
    const stored = entryFirstValue(account, 'password');

    return credentials.every((c) => {
      switch (c.kind) {
        case 'Anonymous':
          return stored === null;
        case 'Password':
          return stored !== null && secretsEqual(stored, c.password);
      }
    });
  }

  async userToken(principal: string, appid: string | null): Promise<UserAuthToken | null> {
    const account = await this.account(principal);
    const uuid = account === null ? null : entryFirstValue(account, 'uuid');
    if (account === null || uuid === null) return null;

    let application: Application | null = null;
    if (appid !== null) {
      application = await this.application(appid);
      if (application === null) return null;
    }

    const name = entryFirstValue(account, 'name') ?? principal;
    return {
      name,
      displayname: entryFirstValue(account, 'displayname') ?? name,
      uuid,
      application,
      groups: await this.groups(entryValues(account, 'memberof')),
      claims: [],
    };
  }

  private async account(principal: string): Promise<Entry | null> {
    const found = await this.lookup(filter.eq('name', principal));
    return found.length === 1 ? (found[0] ?? null) : null;
  }

  private async application(appid: string): Promise<Application | null> {
    const found = await this.lookup(
      filter.and(filter.eq('class', 'application'), filter.or(filter.eq('uuid', appid), filter.eq('name', appid))),
    );
    const [entry] = found;
    if (found.length !== 1 || entry === undefined) return null;
    const uuid = entryFirstValue(entry, 'uuid');
    const name = entryFirstValue(entry, 'name');
    return uuid === null || name === null ? null : { name, uuid };
  }

  /** Groups the account is a member of, in the order the store returns them. */
  private async groups(memberof: readonly string[]): Promise<Group[]> {
    if (memberof.length === 0) return [];
    const found = await this.lookup({ kind: 'or', filters: memberof.map((uuid) => filter.eq('uuid', uuid)) });
    return found.flatMap((entry) => {
      const uuid = entryFirstValue(entry, 'uuid');
      const name = entryFirstValue(entry, 'name');
      return uuid !== null && name !== null && entryHasValue(entry, 'class', 'group') ? [{ name, uuid }] : [];
    });
  }

  private async lookup(f: Filter): Promise<Entry[]> {
    const canonical = canonicalize(f);
    if (!canonical.ok) throw new OperationFailure(canonical.error);
    const found = await this.store.evaluate(canonical.value);
    if (!found.ok) throw new OperationFailure(found.error);
    return found.value;
  }
}
