/**
 * Tests for the login action: inline failures and session creation.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FirebaseAuthClient } from "~/lib/auth/firebase.server";
import { getCurrentUser } from "~/lib/auth/user.server";
import { fail, ok } from "~/lib/errors";
import { getServices } from "~/lib/services.server";
import { TMDBClient } from "~/lib/tmdb/client.server";
import { FirebaseDatabaseClient } from "~/lib/watchlist/database.server";
import { action, loader } from "./auth.login";

vi.mock("~/lib/services.server", () => ({ getServices: vi.fn() }));

const user = {
  identity: "u1",
  email: "ada@example.com",
  displayName: null,
  idToken: "test-token",
};

function loginRequest(fields: Record<string, string>): Request {
  const body = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    body.set(name, value);
  }
  return new Request("http://localhost/auth/login", { method: "POST", body });
}

describe("login action", () => {
  let auth: FirebaseAuthClient;
  let database: FirebaseDatabaseClient;

  beforeEach(() => {
    vi.stubEnv("SESSION_SECRET", "test-secret");
    auth = new FirebaseAuthClient("test-firebase");
    database = new FirebaseDatabaseClient("https://cinebase-test.example.com");
    vi.mocked(getServices).mockReturnValue({
      auth,
      database,
      metadata: new TMDBClient("test-tmdb"),
      insight: null,
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("asks for both fields before calling the auth service", async () => {
    const signIn = vi.spyOn(auth, "signIn");

    const response = await action({
      request: loginRequest({ intent: "sign-in", email: "ada@example.com", password: "" }),
      params: {},
      context: {},
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      mode: "sign-in",
      email: "ada@example.com",
      error: "Enter your email and password.",
    });
    expect(signIn).not.toHaveBeenCalled();
  });

  it("shows an auth failure inline", async () => {
    vi.spyOn(auth, "signIn").mockResolvedValue(fail("auth", "Incorrect email or password.", 400));

    const response = await action({
      request: loginRequest({ intent: "sign-in", email: "ada@example.com", password: "wrong" }),
      params: {},
      context: {},
    });

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      mode: "sign-in",
      email: "ada@example.com",
      error: "Incorrect email or password.",
    });
  });

  it("starts a session holding the signed-in identity", async () => {
    vi.spyOn(auth, "signIn").mockResolvedValue(ok(user));

    const response = await action({
      request: loginRequest({ intent: "sign-in", email: "ada@example.com", password: "test-password" }),
      params: {},
      context: {},
    });

    expect(response.status).toBe(302);
    expect(response.headers.get("Location")).toBe("/app");

    const cookie = (response.headers.get("Set-Cookie") ?? "").split(";")[0];
    const context = await getCurrentUser(
      new Request("http://localhost/app", { headers: { Cookie: cookie } })
    );
    expect(context?.user).toEqual(user);
    expect(context?.store.getSelection("currentPage")).toBe("home");
  });

  it("initialises the profile after sign-up", async () => {
    vi.spyOn(auth, "signUp").mockResolvedValue(ok(user));
    const initProfile = vi.spyOn(database, "initProfile").mockResolvedValue(ok(undefined));

    const response = await action({
      request: loginRequest({ intent: "sign-up", email: "ada@example.com", password: "test-password" }),
      params: {},
      context: {},
    });

    expect(initProfile).toHaveBeenCalledWith(user);
    expect(response.status).toBe(302);
  });

  it("tells the user why they were signed out", async () => {
    const response = await loader({
      request: new Request("http://localhost/auth/login?expired=1"),
      params: {},
      context: {},
    });

    expect(await response.json()).toEqual({ expired: true });
  });
});
