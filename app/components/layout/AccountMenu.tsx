import { useCallback, useRef, useState } from "react";
import { Link } from "@remix-run/react";
import { ChevronDown, ListVideo, Settings } from "lucide-react";
import { useDismiss } from "~/hooks/useDismiss";
import type { AccountSummary } from "~/lib/auth/account";
import { AccountBadge } from "./AccountBadge";
import { LogoutButton } from "./LogoutButton";

const itemClass =
  "flex w-full items-center gap-3 px-4 py-2 text-sm text-foreground-secondary hover:bg-background-primary hover:text-foreground-primary";

export function AccountMenu({ account }: { account: AccountSummary }) {
  const [isOpen, setIsOpen] = useState(false);
  const containerRef = useRef<HTMLDivElement>(null);
  const close = useCallback(() => setIsOpen(false), []);
  useDismiss(isOpen, close, containerRef);

  return (
    <div ref={containerRef} className="relative">
      <button
        type="button"
        onClick={() => setIsOpen((open) => !open)}
        className="flex items-center gap-1 rounded-full p-1 hover:bg-background-elevated"
        aria-label="Account menu"
        aria-expanded={isOpen}
        aria-haspopup="menu"
      >
        <AccountBadge account={account} />
        <ChevronDown className={`h-4 w-4 text-foreground-secondary ${isOpen ? "rotate-180" : ""}`} />
      </button>

      {isOpen && (
        <div
          role="menu"
          className="absolute right-0 top-full mt-2 w-56 rounded-md bg-background-elevated py-1 shadow-lg ring-1 ring-border-subtle"
        >
          <div className="border-b border-border-subtle px-4 py-3">
            <AccountBadge account={account} withDetails />
          </div>
          <Link to="/app/watchlist" role="menuitem" className={itemClass} onClick={close}>
            <ListVideo className="h-4 w-4" />
            Watchlist
          </Link>
          <Link to="/app/settings" role="menuitem" className={itemClass} onClick={close}>
            <Settings className="h-4 w-4" />
            Settings
          </Link>
          <LogoutButton role="menuitem" className={`${itemClass} border-t border-border-subtle`} />
        </div>
      )}
    </div>
  );
}
