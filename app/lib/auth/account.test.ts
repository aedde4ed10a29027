import { describe, expect, it } from "vitest";
import { accountInitial, accountLabel, toAccountSummary } from "./account";

describe("account summary", () => {
  it("leaves the ID token out", () => {
    const summary = toAccountSummary({
      identity: "u1",
      email: "ada@example.com",
      displayName: null,
      idToken: "test-token",
    });
    expect(summary).toEqual({ identity: "u1", email: "ada@example.com", displayName: null });
  });

  it("labels the account by display name, falling back to email", () => {
    expect(accountLabel({ identity: "u1", email: "ada@example.com", displayName: "Ada" })).toBe("Ada");
    expect(accountLabel({ identity: "u1", email: "ada@example.com", displayName: null })).toBe(
      "ada@example.com"
    );
  });

  it("uses the first letter of the label as the avatar initial", () => {
    expect(accountInitial({ identity: "u1", email: "ada@example.com", displayName: "grace" })).toBe("G");
    expect(accountInitial({ identity: "u1", email: "ada@example.com", displayName: null })).toBe("A");
    expect(accountInitial({ identity: "u1", email: "", displayName: null })).toBe("?");
  });
});
