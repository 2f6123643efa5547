import { z } from 'zod';

export const STATE_KEY_PREFIX = 'oauth:state:';
export const OAUTH1_KEY_PREFIX = 'oauth:oauth1a:';

/** Pending attempts expire after five minutes unless configured otherwise */
export const DEFAULT_STATE_TTL_SECONDS = 300;

export function stateKey(state: string): string {
  return `${STATE_KEY_PREFIX}${state}`;
}

export function oauth1TokenKey(oauthToken: string): string {
  return `${OAUTH1_KEY_PREFIX}${oauthToken}`;
}

/**
 * Anti-forgery record written at `authorize` and consumed once at `login`.
 */
export const AuthStateSchema = z.object({
  state: z.string().min(1),
  source: z.string().min(1),
  /** Milliseconds since the epoch */
  createdAt: z.number().int().nonnegative(),
  oauthToken: z.string().min(1).optional(),
  oauthTokenSecret: z.string().optional(),
});

export type AuthState = z.infer<typeof AuthStateSchema>;

export function serializeAuthState(state: AuthState): string {
  return JSON.stringify(state);
}

/**
 * Parse a cached entry. Anything that is not a well-formed AuthState reads
 * as absent.
 */
export function parseAuthState(value: string | undefined): AuthState | undefined {
  if (value === undefined) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return undefined;
  }
  const result = AuthStateSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

/**
 * Phases of one authorization attempt. `authorize` moves an attempt from
 * CREATED to AUTHORIZING; `login` resumes it from AUTHORIZING.
 */
export enum AuthPhase {
  Created = 'CREATED',
  Authorizing = 'AUTHORIZING',
  Validated = 'VALIDATED',
  Exchanged = 'EXCHANGED',
  ProfileFetched = 'PROFILE_FETCHED',
  Failed = 'FAILED',
}

const TRANSITIONS: Readonly<Record<AuthPhase, readonly AuthPhase[]>> = {
  [AuthPhase.Created]: [AuthPhase.Authorizing, AuthPhase.Failed],
  [AuthPhase.Authorizing]: [AuthPhase.Validated, AuthPhase.Failed],
  [AuthPhase.Validated]: [AuthPhase.Exchanged, AuthPhase.Failed],
  [AuthPhase.Exchanged]: [AuthPhase.ProfileFetched, AuthPhase.Failed],
  [AuthPhase.ProfileFetched]: [],
  [AuthPhase.Failed]: [],
};

export function canTransition(from: AuthPhase, to: AuthPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalPhase(phase: AuthPhase): boolean {
  return TRANSITIONS[phase].length === 0;
}
