import type { AuthenticatedUser } from "./types";

/**
 * Account fields safe to send to the browser. The ID token stays on the server.
 */
export interface AccountSummary {
  identity: string;
  email: string;
  displayName: string | null;
}

export function toAccountSummary(user: AuthenticatedUser): AccountSummary {
  return {
    identity: user.identity,
    email: user.email,
    displayName: user.displayName,
  };
}

export function accountLabel(account: AccountSummary): string {
  return account.displayName || account.email;
}

/**
 * Upper-case first letter of the label, or "?" when there is none.
 */
export function accountInitial(account: AccountSummary): string {
  const first = accountLabel(account).trim().charAt(0);
  return first ? first.toUpperCase() : "?";
}
