import type { AppPage } from "~/lib/session/types";

/**
 * Which top-level page a /app path belongs to.
 */
export function pageForPath(pathname: string): AppPage {
  if (pathname.startsWith("/app/watchlist")) return "watchlist";
  if (pathname.startsWith("/app/settings")) return "settings";
  return "home";
}
