/**
 * User context helpers for getting the signed-in user and their session state.
 */

import { redirect } from "@remix-run/node";
import type { ServiceError } from "~/lib/errors";
import { createLogger } from "~/lib/logger.server";
import type { SessionStateStore } from "~/lib/session/state.server";
import { endUserSession, getSessionStore } from "./session.server";
import type { AuthenticatedUser } from "./types";

export type { AuthenticatedUser };

const logger = createLogger("Auth");

/** Where an ended session sends the user */
export const SESSION_EXPIRED_REDIRECT = "/auth/login?expired=1";

export interface UserContext {
  user: AuthenticatedUser;
  store: SessionStateStore;
}

/**
 * Get the signed-in user and their store.
 * Returns null if there is no live session or nobody is signed in to it.
 */
export async function getCurrentUser(request: Request): Promise<UserContext | null> {
  const store = await getSessionStore(request);
  if (!store) return null;
  const user = store.getSelection("identity");
  if (!user) return null;
  return { user, store };
}

/**
 * Require a signed-in user, redirect to login if not present.
 */
export async function requireUser(request: Request): Promise<UserContext> {
  const context = await getCurrentUser(request);
  if (!context) {
    throw redirect("/auth/login");
  }
  return context;
}

/**
 * Sign the user out when a call made with their ID token was refused (an
 * "auth" error with status 401 or 403). The token cannot be renewed here, so
 * retrying would fail the same way. Returns normally for any other error.
 */
export async function endSessionOnAuthError(request: Request, error: ServiceError): Promise<void> {
  if (error.kind !== "auth" || (error.status !== 401 && error.status !== 403)) return;
  logger.info("ID token refused; ending session", { message: error.message });
  throw await endUserSession(request, SESSION_EXPIRED_REDIRECT);
}
