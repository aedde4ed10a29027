/**
 * Session cookie handling using Remix cookie session storage.
 * The cookie only carries the session id; identity and UI state live in the
 * server-side SessionStateStore for that id.
 */

import { createCookieSessionStorage, redirect } from "@remix-run/node";
import { env } from "~/lib/env.server";
import { getSessionRegistry } from "~/lib/session/registry.server";
import type { SessionStateStore } from "~/lib/session/state.server";

type SessionData = {
  sessionId: string;
};

let sessionStorage: ReturnType<typeof createSessionStorage> | null = null;

function createSessionStorage() {
  return createCookieSessionStorage<SessionData>({
    cookie: {
      name: "__cinebase_session",
      httpOnly: true,
      maxAge: 60 * 60 * 24 * 7, // 7 days
      path: "/",
      sameSite: "lax",
      secrets: [env.SESSION_SECRET],
      secure: env.SECURE_COOKIES,
    },
  });
}

function getStorage() {
  if (!sessionStorage) {
    sessionStorage = createSessionStorage();
  }
  return sessionStorage;
}

/**
 * Get the session from the request's cookies.
 */
export async function getSession(request: Request) {
  const cookie = request.headers.get("Cookie");
  return getStorage().getSession(cookie);
}

export type CookieSession = Awaited<ReturnType<typeof getSession>>;

/**
 * Commit the session and return the Set-Cookie header value.
 */
export async function commitSession(session: CookieSession) {
  return getStorage().commitSession(session);
}

/**
 * Destroy the session and return the Set-Cookie header value.
 */
export async function destroySession(session: CookieSession) {
  return getStorage().destroySession(session);
}

/**
 * Look up the state store for this request's session, if it is still alive.
 */
export async function getSessionStore(request: Request): Promise<SessionStateStore | null> {
  const session = await getSession(request);
  const sessionId = session.get("sessionId");
  if (!sessionId) return null;
  return getSessionRegistry().get(sessionId);
}

/**
 * Point the cookie at a freshly created store and redirect.
 */
export async function createUserSession(
  request: Request,
  store: SessionStateStore,
  redirectTo: string
) {
  const session = await getSession(request);
  const previousId = session.get("sessionId");
  if (previousId && previousId !== store.id) {
    getSessionRegistry().destroy(previousId);
  }
  session.set("sessionId", store.id);

  return redirect(redirectTo, {
    headers: {
      "Set-Cookie": await commitSession(session),
    },
  });
}

/**
 * Tear down the session's store and clear the cookie.
 */
export async function endUserSession(request: Request, redirectTo = "/auth/login") {
  const session = await getSession(request);
  const sessionId = session.get("sessionId");
  if (sessionId) {
    getSessionRegistry().destroy(sessionId);
  }
  return redirect(redirectTo, {
    headers: {
      "Set-Cookie": await destroySession(session),
    },
  });
}
