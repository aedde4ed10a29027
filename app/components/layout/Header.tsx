/**
 * Fixed header with navigation, the global search box and the account menu.
 * The background turns solid once the page scrolls.
 */

import { useState, useEffect, useCallback } from 'react';
import { Form, NavLink, Link } from '@remix-run/react';
import { Clapperboard, Menu, Search } from 'lucide-react';
import type { AccountSummary } from '~/lib/auth/account';
import { AccountMenu } from './AccountMenu';
import { Container } from './Container';
import { MobileMenu } from './MobileMenu';

interface HeaderProps {
  account: AccountSummary;
  /** Current search text, kept in the box across navigations */
  query: string;
}

export interface NavItem {
  label: string;
  to: string;
}

const navItems: NavItem[] = [
  { label: 'Home', to: '/app' },
  { label: 'Watchlist', to: '/app/watchlist' },
  { label: 'Settings', to: '/app/settings' },
];

function NavLinkItem({ item }: { item: NavItem }) {
  return (
    <NavLink
      to={item.to}
      end={item.to === '/app'}
      className={({ isActive }) =>
        `text-sm font-medium transition-colors duration-200 ${
          isActive
            ? 'text-foreground-primary'
            : 'text-foreground-secondary hover:text-foreground-primary'
        }`
      }
    >
      {item.label}
    </NavLink>
  );
}

export function Header({ account, query }: HeaderProps) {
  const [isScrolled, setIsScrolled] = useState(false);
  const [isMobileMenuOpen, setIsMobileMenuOpen] = useState(false);

  const handleScroll = useCallback(() => {
    setIsScrolled(window.scrollY > 10);
  }, []);

  useEffect(() => {
    handleScroll();

    // Throttle scroll events to one per frame
    let ticking = false;
    const onScroll = () => {
      if (!ticking) {
        window.requestAnimationFrame(() => {
          handleScroll();
          ticking = false;
        });
        ticking = true;
      }
    };

    window.addEventListener('scroll', onScroll, { passive: true });
    return () => window.removeEventListener('scroll', onScroll);
  }, [handleScroll]);

  const toggleMobileMenu = () => setIsMobileMenuOpen((prev) => !prev);
  const closeMobileMenu = useCallback(() => setIsMobileMenuOpen(false), []);

  return (
    <>
      <header
        className={`fixed left-0 right-0 top-0 z-50 h-16 transition-colors duration-300 ${
          isScrolled
            ? 'bg-background-primary/95 backdrop-blur-sm'
            : 'bg-gradient-to-b from-black/80 to-transparent'
        }`}
      >
        <Container size="wide">
          <div className="flex h-16 items-center justify-between gap-4">
            <div className="flex items-center gap-8">
              <Link to="/app" className="flex items-center gap-2 text-lg font-bold text-foreground-primary">
                <Clapperboard className="h-6 w-6 text-accent-primary" />
                CineBase
              </Link>

              <nav className="hidden items-center gap-6 md:flex">
                {navItems.map((item) => (
                  <NavLinkItem key={item.to} item={item} />
                ))}
              </nav>
            </div>

            <div className="flex flex-1 items-center justify-end gap-4">
              <Form method="get" action="/app" role="search" className="relative hidden w-full max-w-xs sm:block">
                <Search className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-foreground-muted" />
                <input
                  type="search"
                  name="q"
                  defaultValue={query}
                  key={query}
                  placeholder="Search movies & TV..."
                  aria-label="Search movies and TV"
                  className="w-full rounded-md border border-border-subtle bg-background-elevated py-2 pl-9 pr-3 text-sm text-foreground-primary placeholder:text-foreground-muted focus:border-accent-primary focus:outline-none"
                />
              </Form>

              <div className="hidden sm:block">
                <AccountMenu account={account} />
              </div>

              <button
                onClick={toggleMobileMenu}
                className="rounded-md p-2 text-foreground-secondary transition-colors hover:bg-background-elevated hover:text-foreground-primary md:hidden"
                aria-label="Open menu"
                aria-expanded={isMobileMenuOpen}
              >
                <Menu className="h-6 w-6" />
              </button>
            </div>
          </div>
        </Container>
      </header>

      <MobileMenu
        isOpen={isMobileMenuOpen}
        onClose={closeMobileMenu}
        navItems={navItems}
        account={account}
        query={query}
      />
    </>
  );
}
