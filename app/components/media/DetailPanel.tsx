/**
 * Details of the selected title with its actions: add to watchlist,
 * AI insights and close. Favorites is shown but not available yet.
 */

import { Form, useNavigation } from "@remix-run/react";
import { Heart, Loader2, Plus, Sparkles, Star, X } from "lucide-react";
import { Button, Notice, Typography } from "~/components/ui";
import {
  formatMetaLine,
  formatRuntime,
  kindLabel,
  releaseYear,
  toMediaId,
} from "~/lib/media";
import type { InsightRecord } from "~/lib/session/types";
import type { MediaDetails } from "~/lib/tmdb/types";
import { CastRow } from "./CastRow";
import { InsightCard } from "./InsightCard";

interface DetailPanelProps {
  details: MediaDetails;
  /** Last insight for this title, if one was generated in this session */
  insight: InsightRecord | null;
  insightsEnabled: boolean;
}

function lengthLabel(details: MediaDetails): string | undefined {
  if (details.kind === "movie") {
    return formatRuntime(details.runtime);
  }
  if (details.seasons) {
    return details.seasons === 1 ? "1 Season" : `${details.seasons} Seasons`;
  }
  return undefined;
}

function RatingsRow({ details }: { details: MediaDetails }) {
  const { imdb, rottenTomatoes, metacritic } = details.externalRatings;
  const items: Array<{ label: string; value: string }> = [];

  if (details.rating != null) {
    items.push({ label: "TMDB", value: details.rating.toFixed(1) });
  }
  if (imdb) items.push({ label: "IMDb", value: imdb.rating });
  if (rottenTomatoes) items.push({ label: "Rotten Tomatoes", value: rottenTomatoes.rating });
  if (metacritic) items.push({ label: "Metacritic", value: metacritic.rating });

  if (items.length === 0) {
    return null;
  }

  return (
    <div className="flex flex-wrap gap-4">
      {items.map((item) => (
        <span key={item.label} className="inline-flex items-center gap-1.5 text-sm text-foreground-secondary">
          <Star className="h-4 w-4 fill-current text-accent-tertiary" />
          <span className="font-semibold text-foreground-primary">{item.value}</span>
          {item.label}
        </span>
      ))}
    </div>
  );
}

export function DetailPanel({ details, insight, insightsEnabled }: DetailPanelProps) {
  const navigation = useNavigation();
  const pendingIntent =
    navigation.state === "submitting" ? navigation.formData?.get("intent") : null;
  const mediaId = toMediaId(details.kind, details.id);

  const metaLine = formatMetaLine([
    releaseYear(details.releaseDate),
    kindLabel(details.kind),
    lengthLabel(details),
    details.genres.join(", "),
  ]);
  const creditLabel = details.kind === "movie" ? "Directed by" : "Created by";

  return (
    <section className="relative mb-10 overflow-hidden rounded-lg bg-background-secondary">
      {details.backdropUrl && (
        <div
          className="absolute inset-0 bg-cover bg-center opacity-20"
          style={{ backgroundImage: `url("${details.backdropUrl}")` }}
          aria-hidden="true"
        />
      )}

      <div className="relative flex flex-col gap-6 p-6 md:flex-row">
        {details.posterUrl && (
          <img
            src={details.posterUrl}
            alt={details.title}
            className="w-40 flex-shrink-0 self-start rounded-md shadow-xl md:w-56"
          />
        )}

        <div className="min-w-0 flex-1 space-y-4">
          <div>
            <Typography variant="display">{details.title}</Typography>
            {metaLine && (
              <Typography variant="caption" as="p" className="mt-1">
                {metaLine}
              </Typography>
            )}
          </div>

          <RatingsRow details={details} />

          {details.awards && (
            <Typography variant="caption" as="p" className="text-accent-tertiary">
              {details.awards}
            </Typography>
          )}

          {details.directedBy.length > 0 && (
            <Typography variant="caption" as="p">
              {creditLabel}{" "}
              <span className="text-foreground-secondary">{details.directedBy.join(", ")}</span>
            </Typography>
          )}

          {details.overview && (
            <Typography variant="body" className="max-w-3xl text-foreground-secondary">
              {details.overview}
            </Typography>
          )}

          <Form method="post" className="flex flex-wrap gap-3">
            <input type="hidden" name="mediaId" value={mediaId} />
            <Button type="submit" name="intent" value="add-to-watchlist" size="sm">
              {pendingIntent === "add-to-watchlist" ? (
                <Loader2 className="h-4 w-4 animate-spin" />
              ) : (
                <Plus className="h-4 w-4" />
              )}
              Add to Watchlist
            </Button>
            <Button
              type="submit"
              name="intent"
              value="insight"
              variant="secondary"
              size="sm"
              disabled={!insightsEnabled || pendingIntent === "insight"}
            >
              {pendingIntent === "insight" ? (
                <Loader2 className="h-4 w-4 animate-spin" />
              ) : (
                <Sparkles className="h-4 w-4" />
              )}
              AI Insights
            </Button>
            <Button variant="ghost" size="sm" disabled title="Favorites are coming soon">
              <Heart className="h-4 w-4" />
              Favorite
            </Button>
            <Button type="submit" name="intent" value="clear-selection" variant="ghost" size="sm">
              <X className="h-4 w-4" />
              Close
            </Button>
          </Form>

          {!insightsEnabled && (
            <Notice
              tone="info"
              message="AI insights are not configured on this server."
            />
          )}
          {insight && <InsightCard insight={insight} />}

          <CastRow cast={details.cast} />
        </div>
      </div>
    </section>
  );
}
