export interface Group {
  readonly name: string;
  readonly uuid: string;
}

/** Ephemeral, session-scoped attribute granted with a token. */
export interface Claim {
  readonly name: string;
  readonly uuid: string;
}

export interface Application {
  readonly name: string;
  readonly uuid: string;
}

/**
 * Identity assertion issued when a negotiation succeeds. Lives as long as
 * the session it was issued for.
 */
export interface UserAuthToken {
  readonly name: string;
  readonly displayname: string;
  readonly uuid: string;
  readonly application: Application | null;
  readonly groups: readonly Group[];
  readonly claims: readonly Claim[];
}

export type AuthCredential =
  | { readonly kind: 'Anonymous' }
  | { readonly kind: 'Password'; readonly password: string };

/** A credential mechanism the server currently accepts. */
export type AuthAllowed = AuthCredential['kind'];

export const AUTH_MECHANISMS: readonly AuthAllowed[] = ['Anonymous', 'Password'];

export type AuthStep =
  | { readonly kind: 'Init'; readonly name: string; readonly appid: string | null }
  | { readonly kind: 'Creds'; readonly creds: readonly AuthCredential[] };

export type AuthState =
  | { readonly kind: 'Success'; readonly token: UserAuthToken }
  | { readonly kind: 'Denied'; readonly reason: string }
  | { readonly kind: 'Continue'; readonly allowed: readonly AuthAllowed[] };

export interface AuthRequest {
  /** Session being advanced; ignored by Init, which always opens a new one. */
  readonly sessionid: string | null;
  readonly step: AuthStep;
}

export interface AuthResponse {
  readonly sessionid: string;
  readonly state: AuthState;
}

/** The only reason a denial ever carries. */
export const DENIED_REASON = 'authentication denied';

export const authStep = {
  init(name: string, appid: string | null = null): AuthStep {
    return { kind: 'Init', name, appid };
  },
  creds(creds: readonly AuthCredential[]): AuthStep {
    return { kind: 'Creds', creds: [...creds] };
  },
};

export const credential = {
  anonymous(): AuthCredential {
    return { kind: 'Anonymous' };
  },
  password(password: string): AuthCredential {
    return { kind: 'Password', password };
  },
};

function describeNamed(items: readonly { name: string; uuid: string }[]): string {
  return `[${items.map((i) => `${i.name} (${i.uuid})`).join(', ')}]`;
}

export function describeUserAuthToken(token: UserAuthToken): string {
  return [
    `name: ${token.name}`,
    `display: ${token.displayname}`,
    `uuid: ${token.uuid}`,
    `groups: ${describeNamed(token.groups)}`,
    `claims: ${describeNamed(token.claims)}`,
  ].join('\n');
}
