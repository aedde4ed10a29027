import { accountLabel, accountInitial, type AccountSummary } from "~/lib/auth/account";

interface AccountBadgeProps {
  account: AccountSummary;
  /** Show the name and email beside the initial */
  withDetails?: boolean;
}

export function AccountBadge({ account, withDetails = false }: AccountBadgeProps) {
  return (
    <span className="flex min-w-0 items-center gap-3">
      <span
        aria-hidden="true"
        className="flex h-8 w-8 shrink-0 items-center justify-center rounded-full bg-accent-secondary text-sm font-semibold text-background-primary"
      >
        {accountInitial(account)}
      </span>
      {withDetails && (
        <span className="min-w-0 text-left">
          <span className="block truncate text-sm font-medium text-foreground-primary">
            {accountLabel(account)}
          </span>
          {account.displayName && (
            <span className="block truncate text-xs text-foreground-muted">{account.email}</span>
          )}
        </span>
      )}
    </span>
  );
}
