import { useState, type ReactNode } from "react";
import { Film, Star } from "lucide-react";
import { Typography } from "~/components/ui";

interface PosterCardProps {
  title: string;
  /** Poster image URL, 2:3 aspect ratio */
  posterUrl: string | null;
  /** Year and kind, e.g. "1999 • Movie" */
  subtitle?: string;
  /** TMDB score (0-10 scale), shown as a gold star badge */
  rating?: number | null;
  /** Highlight ring for the selected title */
  isSelected?: boolean;
  /** Buttons rendered under the poster */
  children?: ReactNode;
}

/**
 * Vertical poster card with a title line and an action slot.
 */
export function PosterCard({
  title,
  posterUrl,
  subtitle,
  rating,
  isSelected = false,
  children,
}: PosterCardProps) {
  const [imageError, setImageError] = useState(false);

  return (
    <div className="group flex flex-col">
      <div
        className={`relative aspect-[2/3] overflow-hidden rounded-md bg-background-elevated shadow-lg transition-transform duration-300 group-hover:-translate-y-1 ${
          isSelected ? "ring-2 ring-accent-primary" : ""
        }`}
      >
        {posterUrl && !imageError ? (
          <img
            src={posterUrl}
            alt={title}
            className="h-full w-full object-cover"
            loading="lazy"
            onError={() => setImageError(true)}
          />
        ) : (
          <div className="flex h-full w-full flex-col items-center justify-center gap-2 p-3 text-center">
            <Film className="h-10 w-10 text-foreground-muted" />
            <span className="text-xs text-foreground-muted">{title}</span>
          </div>
        )}

        {rating != null && (
          <span className="absolute right-2 top-2 inline-flex items-center gap-1 rounded bg-black/70 px-1.5 py-0.5 text-xs font-semibold text-accent-tertiary">
            <Star className="h-3 w-3 fill-current" />
            {rating.toFixed(1)}
          </span>
        )}
      </div>

      <div className="mt-2 min-w-0">
        <Typography variant="body" as="p" className="truncate text-sm font-medium">
          {title}
        </Typography>
        {subtitle && (
          <Typography variant="caption" as="p" className="truncate text-xs">
            {subtitle}
          </Typography>
        )}
      </div>

      {children && <div className="mt-2 flex flex-wrap gap-2">{children}</div>}
    </div>
  );
}
