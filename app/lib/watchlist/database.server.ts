/**
 * Firebase Realtime Database client for per-user watchlists and profiles.
 * Every path lives under /users/<identity>/ and is authorized with the user's ID token.
 */

import type { AuthenticatedUser } from "~/lib/auth/types";
import { env } from "~/lib/env.server";
import {
  fail,
  fromFetchError,
  kindForStatus,
  ok,
  type ServiceResult,
} from "~/lib/errors";
import { createLogger } from "~/lib/logger.server";
import { isMediaKind, parseMediaId } from "~/lib/media";
import type { StoredWatchlistEntry, UserProfile, WatchlistEntry } from "./types";

const DATABASE_REQUEST_TIMEOUT = 10000;

const logger = createLogger("Watchlist");

type HttpMethod = "GET" | "PUT" | "PATCH" | "DELETE";

/**
 * Turn the `{ [mediaId]: entry }` map the database returns into entries sorted by title.
 * Records with an unusable key are skipped.
 */
export function entriesFromSnapshot(
  snapshot: Record<string, StoredWatchlistEntry> | null
): WatchlistEntry[] {
  if (!snapshot) return [];

  const entries: WatchlistEntry[] = [];
  for (const [mediaId, stored] of Object.entries(snapshot)) {
    const parsed = parseMediaId(mediaId);
    const kind = isMediaKind(stored.kind) ? stored.kind : parsed?.kind;
    if (!kind) {
      logger.warn(`Skipping watchlist record with unknown kind: ${mediaId}`);
      continue;
    }
    entries.push({
      mediaId,
      kind,
      title: stored.title || "Untitled",
      posterUrl: stored.posterUrl ?? null,
    });
  }

  return entries.sort((a, b) => a.title.localeCompare(b.title));
}

export class FirebaseDatabaseClient {
  private readonly dbUrl: string;

  constructor(dbUrl: string) {
    this.dbUrl = dbUrl.replace(/\/+$/, "");
  }

  private userUrl(user: AuthenticatedUser, path: string): string {
    const suffix = path ? `/${path}` : "";
    return `${this.dbUrl}/users/${encodeURIComponent(user.identity)}${suffix}.json?auth=${encodeURIComponent(user.idToken)}`;
  }

  private async request<T>(
    method: HttpMethod,
    url: string,
    body?: unknown
  ): Promise<ServiceResult<T | null>> {
    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), DATABASE_REQUEST_TIMEOUT);

      const response = await fetch(url, {
        method,
        headers: body === undefined
          ? { Accept: "application/json" }
          : { Accept: "application/json", "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        const kind = kindForStatus(response.status);
        return fail(
          kind === "auth" ? "auth" : "network",
          kind === "auth"
            ? "Your session has expired. Please sign in again."
            : `HTTP ${response.status}: ${response.statusText}`,
          response.status
        );
      }

      if (response.status === 204) {
        return ok(null);
      }

      const text = await response.text();
      if (!text) {
        return ok(null);
      }
      const data: T | null = JSON.parse(text);
      return ok(data);
    } catch (error) {
      return fromFetchError(error);
    }
  }

  async addEntry(user: AuthenticatedUser, entry: WatchlistEntry): Promise<ServiceResult<void>> {
    const stored: StoredWatchlistEntry = {
      title: entry.title,
      kind: entry.kind,
      posterUrl: entry.posterUrl,
    };
    const result = await this.request<StoredWatchlistEntry>(
      "PUT",
      this.userUrl(user, `watchlist/${entry.mediaId}`),
      stored
    );
    if (!result.success) {
      logger.error(`Failed to save ${entry.mediaId}`, { message: result.error.message });
      return result;
    }
    logger.info(`Added ${entry.mediaId} for ${user.identity}`);
    return ok(undefined);
  }

  async removeEntry(user: AuthenticatedUser, mediaId: string): Promise<ServiceResult<void>> {
    const result = await this.request<null>("DELETE", this.userUrl(user, `watchlist/${mediaId}`));
    if (!result.success) {
      logger.error(`Failed to remove ${mediaId}`, { message: result.error.message });
      return result;
    }
    logger.info(`Removed ${mediaId} for ${user.identity}`);
    return ok(undefined);
  }

  async listEntries(user: AuthenticatedUser): Promise<ServiceResult<WatchlistEntry[]>> {
    const result = await this.request<Record<string, StoredWatchlistEntry>>(
      "GET",
      this.userUrl(user, "watchlist")
    );
    if (!result.success) return result;
    return ok(entriesFromSnapshot(result.data));
  }

  async clearEntries(user: AuthenticatedUser): Promise<ServiceResult<void>> {
    const result = await this.request<null>("DELETE", this.userUrl(user, "watchlist"));
    if (!result.success) return result;
    logger.info(`Cleared watchlist for ${user.identity}`);
    return ok(undefined);
  }

  /**
   * Seed the user record right after sign-up.
   */
  async initProfile(user: AuthenticatedUser): Promise<ServiceResult<void>> {
    const result = await this.request<unknown>("PATCH", this.userUrl(user, ""), {
      email: user.email,
    });
    if (!result.success) return result;
    return ok(undefined);
  }

  async updateProfile(user: AuthenticatedUser, profile: UserProfile): Promise<ServiceResult<void>> {
    const result = await this.request<UserProfile>("PATCH", this.userUrl(user, "profile"), profile);
    if (!result.success) return result;
    return ok(undefined);
  }
}

export function createDatabaseClient(): FirebaseDatabaseClient {
  return new FirebaseDatabaseClient(env.FIREBASE_DB_URL);
}
