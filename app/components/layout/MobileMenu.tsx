/**
 * Drawer for narrow screens: search, navigation and the account.
 */

import { useEffect } from "react";
import { Form, NavLink } from "@remix-run/react";
import { Search, X } from "lucide-react";
import { useDismiss } from "~/hooks/useDismiss";
import type { AccountSummary } from "~/lib/auth/account";
import { AccountBadge } from "./AccountBadge";
import { LogoutButton } from "./LogoutButton";
import type { NavItem } from "./Header";

interface MobileMenuProps {
  isOpen: boolean;
  onClose: () => void;
  navItems: NavItem[];
  account: AccountSummary;
  query: string;
}

export function MobileMenu({ isOpen, onClose, navItems, account, query }: MobileMenuProps) {
  useDismiss(isOpen, onClose);

  // The page behind the drawer must not scroll
  useEffect(() => {
    if (!isOpen) return;
    document.body.style.overflow = "hidden";
    return () => {
      document.body.style.overflow = "";
    };
  }, [isOpen]);

  if (!isOpen) return null;

  return (
    <div className="fixed inset-0 z-50 md:hidden" role="dialog" aria-modal="true" aria-label="Navigation">
      <div className="absolute inset-0 bg-black/60" onClick={onClose} aria-hidden="true" />

      <aside className="absolute inset-y-0 right-0 flex w-72 flex-col bg-background-secondary shadow-xl">
        <div className="flex items-center justify-between border-b border-border-subtle p-4">
          <AccountBadge account={account} withDetails />
          <button
            type="button"
            onClick={onClose}
            className="rounded-md p-2 text-foreground-secondary hover:text-foreground-primary"
            aria-label="Close menu"
          >
            <X className="h-5 w-5" />
          </button>
        </div>

        <Form method="get" action="/app" role="search" className="relative m-4" onSubmit={onClose}>
          <Search className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-foreground-muted" />
          <input
            type="search"
            name="q"
            defaultValue={query}
            placeholder="Search movies & TV..."
            aria-label="Search movies and TV"
            className="w-full rounded-md border border-border-subtle bg-background-elevated py-2 pl-9 pr-3 text-sm text-foreground-primary placeholder:text-foreground-muted focus:border-accent-primary focus:outline-none"
          />
        </Form>

        <nav className="flex flex-1 flex-col px-2">
          {navItems.map((item) => (
            <NavLink
              key={item.to}
              to={item.to}
              end={item.to === "/app"}
              onClick={onClose}
              className={({ isActive }) =>
                `rounded-md px-4 py-3 font-medium ${
                  isActive ? "text-accent-primary" : "text-foreground-secondary hover:text-foreground-primary"
                }`
              }
            >
              {item.label}
            </NavLink>
          ))}
        </nav>

        <div className="border-t border-border-subtle p-4">
          <LogoutButton className="justify-center rounded-md bg-background-elevated px-4 py-2.5 text-foreground-secondary hover:text-foreground-primary" />
        </div>
      </aside>
    </div>
  );
}
