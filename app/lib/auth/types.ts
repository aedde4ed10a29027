/**
 * Auth types shared by the auth client, the database client and session state.
 */

/**
 * Signed-in user as returned by the Identity Toolkit.
 */
export interface AuthenticatedUser {
  /** Opaque user handle (Firebase localId) */
  identity: string;
  email: string;
  displayName: string | null;
  /** Short-lived ID token, sent as `auth=` to the database */
  idToken: string;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface AccountUpdate {
  email?: string;
  password?: string;
  displayName?: string;
}
