import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { describeAuthError, FirebaseAuthClient } from "./firebase.server";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function sentBody(fetchMock: Mock<typeof fetch>): unknown {
  return JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
}

const user = {
  identity: "u1",
  email: "ada@example.com",
  displayName: "Ada",
  idToken: "test-token",
};

describe("describeAuthError", () => {
  it("maps known codes and keeps unknown ones", () => {
    expect(describeAuthError("INVALID_LOGIN_CREDENTIALS")).toBe("Incorrect email or password.");
    expect(describeAuthError("WEAK_PASSWORD : Password should be at least 6 characters")).toBe(
      "Password should be at least 6 characters."
    );
    expect(describeAuthError("OPERATION_NOT_ALLOWED")).toBe("OPERATION_NOT_ALLOWED");
  });
});

describe("FirebaseAuthClient", () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("signs in with a password and returns the user", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ localId: "u1", email: "ada@example.com", displayName: "", idToken: "test-token" })
    );

    const result = await new FirebaseAuthClient("test-firebase").signIn({
      email: "ada@example.com",
      password: "test-password",
    });

    expect(String(fetchMock.mock.calls[0][0])).toBe(
      "https://identitytoolkit.googleapis.com/v1/accounts:signInWithPassword?key=test-firebase"
    );
    expect(sentBody(fetchMock)).toEqual({
      email: "ada@example.com",
      password: "test-password",
      returnSecureToken: true,
    });
    expect(result).toEqual({
      success: true,
      data: { identity: "u1", email: "ada@example.com", displayName: null, idToken: "test-token" },
    });
  });

  it("returns a readable auth failure for bad credentials", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { code: 400, message: "INVALID_LOGIN_CREDENTIALS" } }, 400));

    const result = await new FirebaseAuthClient("test-firebase").signIn({
      email: "ada@example.com",
      password: "wrong",
    });

    expect(result).toEqual({
      success: false,
      error: { kind: "auth", message: "Incorrect email or password.", status: 400 },
    });
  });

  it("reports a refused ID token as a 401", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { code: 400, message: "TOKEN_EXPIRED" } }, 400));

    const result = await new FirebaseAuthClient("test-firebase").updateAccount(user, { password: "test-password" });

    expect(result).toEqual({
      success: false,
      error: { kind: "auth", message: "Your session has expired. Please sign in again.", status: 401 },
    });
  });

  it("keeps the status of an ordinary rejection", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { code: 400, message: "EMAIL_EXISTS" } }, 400));

    const result = await new FirebaseAuthClient("test-firebase").updateAccount(user, { email: "taken@example.com" });

    expect(result).toEqual({
      success: false,
      error: { kind: "auth", message: "An account with that email already exists.", status: 400 },
    });
  });

  it("treats a server error as a network failure", async () => {
    fetchMock.mockResolvedValue(new Response("upstream down", { status: 503 }));

    const result = await new FirebaseAuthClient("test-firebase").signUp({
      email: "ada@example.com",
      password: "test-password",
    });

    expect(result).toEqual({
      success: false,
      error: { kind: "network", message: "HTTP 503: Sign up failed", status: 503 },
    });
  });

  it("sends only the fields being changed and keeps the rest of the user", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ localId: "u1", email: "new@example.com", idToken: "test-token-2" }));

    const result = await new FirebaseAuthClient("test-firebase").updateAccount(user, {
      email: "new@example.com",
    });

    expect(sentBody(fetchMock)).toEqual({
      idToken: "test-token",
      returnSecureToken: true,
      email: "new@example.com",
    });
    expect(result).toEqual({
      success: true,
      data: { identity: "u1", email: "new@example.com", displayName: "Ada", idToken: "test-token-2" },
    });
  });
});
