/**
 * Firebase Identity Toolkit REST client: email/password sign-in, sign-up and
 * account updates.
 */

import { env } from "~/lib/env.server";
import { fail, fromFetchError, ok, type ServiceResult } from "~/lib/errors";
import { createLogger } from "~/lib/logger.server";
import type { AccountUpdate, AuthenticatedUser, Credentials } from "./types";

const IDENTITY_TOOLKIT_URL = "https://identitytoolkit.googleapis.com/v1";
const AUTH_REQUEST_TIMEOUT = 10000;

const logger = createLogger("Auth");

interface IdentityToolkitUser {
  localId: string;
  email?: string;
  displayName?: string;
  idToken?: string;
}

interface IdentityToolkitError {
  error?: { code?: number; message?: string };
}

/**
 * Readable messages for the Identity Toolkit error codes users can trigger.
 */
const AUTH_ERROR_MESSAGES: Record<string, string> = {
  EMAIL_NOT_FOUND: "No account exists for that email.",
  INVALID_PASSWORD: "Incorrect password.",
  INVALID_LOGIN_CREDENTIALS: "Incorrect email or password.",
  INVALID_EMAIL: "That email address is not valid.",
  EMAIL_EXISTS: "An account with that email already exists.",
  USER_DISABLED: "This account has been disabled.",
  TOO_MANY_ATTEMPTS_TRY_LATER: "Too many attempts. Try again later.",
  TOKEN_EXPIRED: "Your session has expired. Please sign in again.",
  INVALID_ID_TOKEN: "Your session has expired. Please sign in again.",
  CREDENTIAL_TOO_OLD_LOGIN_AGAIN: "Please sign in again before changing your email or password.",
  MISSING_PASSWORD: "Enter a password.",
};

/** Codes meaning the ID token itself was refused and only a new sign-in helps */
const REFUSED_TOKEN_CODES = new Set([
  "TOKEN_EXPIRED",
  "INVALID_ID_TOKEN",
  "CREDENTIAL_TOO_OLD_LOGIN_AGAIN",
]);

function errorCode(raw: string): string {
  return raw.split(" : ")[0].trim();
}

/**
 * Map an Identity Toolkit error message ("WEAK_PASSWORD : Password should be
 * at least 6 characters") to a user-facing message.
 */
export function describeAuthError(raw: string): string {
  const code = errorCode(raw);
  if (AUTH_ERROR_MESSAGES[code]) {
    return AUTH_ERROR_MESSAGES[code];
  }
  if (code === "WEAK_PASSWORD") {
    return "Password should be at least 6 characters.";
  }
  return raw;
}

export class FirebaseAuthClient {
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  private async post<T>(
    endpoint: string,
    payload: Record<string, unknown>,
    fallbackMessage: string
  ): Promise<ServiceResult<T>> {
    const url = `${IDENTITY_TOOLKIT_URL}/${endpoint}?key=${encodeURIComponent(this.apiKey)}`;

    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), AUTH_REQUEST_TIMEOUT);

      const response = await fetch(url, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        let raw = fallbackMessage;
        try {
          const body: IdentityToolkitError = await response.json();
          raw = body.error?.message ?? fallbackMessage;
        } catch {
          // Non-JSON error body; use the fallback.
        }
        if (response.status >= 500) {
          return fail("network", `HTTP ${response.status}: ${raw}`, response.status);
        }
        // Firebase answers 400 for a refused token; report it as a 401 like the database does
        const status = REFUSED_TOKEN_CODES.has(errorCode(raw)) ? 401 : response.status;
        return fail("auth", describeAuthError(raw), status);
      }

      const data: T = await response.json();
      return ok(data);
    } catch (error) {
      return fromFetchError(error);
    }
  }

  private toUser(data: IdentityToolkitUser, previous?: AuthenticatedUser): AuthenticatedUser {
    return {
      identity: data.localId,
      email: data.email ?? previous?.email ?? "",
      displayName: data.displayName || previous?.displayName || null,
      idToken: data.idToken ?? previous?.idToken ?? "",
    };
  }

  async signIn({ email, password }: Credentials): Promise<ServiceResult<AuthenticatedUser>> {
    const result = await this.post<IdentityToolkitUser>(
      "accounts:signInWithPassword",
      { email, password, returnSecureToken: true },
      "Sign in failed"
    );
    if (!result.success) {
      logger.warn("Sign in failed", { kind: result.error.kind });
      return result;
    }
    logger.info(`Signed in ${result.data.localId}`);
    return ok(this.toUser(result.data));
  }

  async signUp({ email, password }: Credentials): Promise<ServiceResult<AuthenticatedUser>> {
    const result = await this.post<IdentityToolkitUser>(
      "accounts:signUp",
      { email, password, returnSecureToken: true },
      "Sign up failed"
    );
    if (!result.success) {
      logger.warn("Sign up failed", { kind: result.error.kind });
      return result;
    }
    logger.info(`Created account ${result.data.localId}`);
    return ok(this.toUser(result.data));
  }

  /**
   * Tokens are only held server-side, so signing out is local.
   */
  signOut(user: AuthenticatedUser): void {
    logger.info(`Signed out ${user.identity}`);
  }

  /**
   * Change email, password or display name. Returns the user with refreshed tokens.
   */
  async updateAccount(
    user: AuthenticatedUser,
    update: AccountUpdate
  ): Promise<ServiceResult<AuthenticatedUser>> {
    const payload: Record<string, unknown> = {
      idToken: user.idToken,
      returnSecureToken: true,
    };
    if (update.email) payload.email = update.email;
    if (update.password) payload.password = update.password;
    if (update.displayName !== undefined) payload.displayName = update.displayName;

    const result = await this.post<IdentityToolkitUser>(
      "accounts:update",
      payload,
      "Failed to update account"
    );
    if (!result.success) return result;

    const updated = this.toUser(result.data, user);
    if (update.displayName !== undefined) {
      updated.displayName = update.displayName || null;
    }
    return ok(updated);
  }
}

export function createAuthClient(): FirebaseAuthClient {
  return new FirebaseAuthClient(env.FIREBASE_API_KEY);
}
