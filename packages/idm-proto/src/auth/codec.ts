import { z } from 'zod';
import type {
  AuthAllowed,
  AuthCredential,
  AuthRequest,
  AuthResponse,
  AuthState,
  AuthStep,
  UserAuthToken,
} from './types.js';
import { authStep, credential } from './types.js';
import type { WireValue } from '../wire.js';

const NamedSchema = z.object({ name: z.string(), uuid: z.string() });

export const UserAuthTokenSchema = z.object({
  name: z.string(),
  displayname: z.string(),
  uuid: z.string(),
  application: NamedSchema.nullable(),
  groups: z.array(NamedSchema),
  claims: z.array(NamedSchema),
});

export const AuthCredentialSchema = z.union([
  z.literal('Anonymous').transform((): AuthCredential => credential.anonymous()),
  z.object({ Password: z.string() }).strict().transform(({ Password }): AuthCredential => credential.password(Password)),
]);

export const AuthAllowedSchema = z.enum(['Anonymous', 'Password']);

export const AuthStepSchema = z.union([
  z
    .object({ Init: z.tuple([z.string(), z.string().nullable()]) })
    .strict()
    .transform(({ Init: [name, appid] }): AuthStep => authStep.init(name, appid)),
  z
    .object({ Creds: z.array(AuthCredentialSchema) })
    .strict()
    .transform(({ Creds }): AuthStep => authStep.creds(Creds)),
]);

export const AuthStateSchema = z.union([
  z.object({ Success: UserAuthTokenSchema }).strict().transform(({ Success }): AuthState => ({ kind: 'Success', token: Success })),
  z.object({ Denied: z.string() }).strict().transform(({ Denied }): AuthState => ({ kind: 'Denied', reason: Denied })),
  z.object({ Continue: z.array(AuthAllowedSchema) }).strict().transform(({ Continue }): AuthState => ({ kind: 'Continue', allowed: Continue })),
]);

export const AuthRequestSchema = z
  .object({ sessionid: z.string().uuid().nullable().optional(), step: AuthStepSchema })
  .transform(({ sessionid, step }): AuthRequest => ({ sessionid: sessionid ?? null, step }));

export const AuthResponseSchema = z
  .object({ sessionid: z.string(), state: AuthStateSchema })
  .transform(({ sessionid, state }): AuthResponse => ({ sessionid, state }));

export function encodeUserAuthToken(token: UserAuthToken): WireValue {
  const named = (n: { name: string; uuid: string }): WireValue => ({ name: n.name, uuid: n.uuid });
  return {
    name: token.name,
    displayname: token.displayname,
    uuid: token.uuid,
    application: token.application === null ? null : named(token.application),
    groups: token.groups.map(named),
    claims: token.claims.map(named),
  };
}

export function encodeAuthCredential(c: AuthCredential): WireValue {
  return c.kind === 'Anonymous' ? 'Anonymous' : { Password: c.password };
}

export function encodeAuthStep(step: AuthStep): WireValue {
  if (step.kind === 'Init') return { Init: [step.name, step.appid] };
  return { Creds: step.creds.map(encodeAuthCredential) };
}

export function encodeAuthAllowed(allowed: AuthAllowed): WireValue {
  return allowed;
}

export function encodeAuthState(state: AuthState): WireValue {
  switch (state.kind) {
    case 'Success':
      return { Success: encodeUserAuthToken(state.token) };
    case 'Denied':
      return { Denied: state.reason };
    case 'Continue':
      return { Continue: state.allowed.map(encodeAuthAllowed) };
  }
}

export function encodeAuthRequest(request: AuthRequest): WireValue {
  return { sessionid: request.sessionid, step: encodeAuthStep(request.step) };
}

export function encodeAuthResponse(response: AuthResponse): WireValue {
  return { sessionid: response.sessionid, state: encodeAuthState(response.state) };
}
