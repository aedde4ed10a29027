import { useState } from "react";
import { User } from "lucide-react";
import { Typography } from "~/components/ui";
import type { CastMember } from "~/lib/tmdb/types";

function CastCard({ name, character, profileUrl }: CastMember) {
  const [imageError, setImageError] = useState(false);

  return (
    <div className="w-[96px] flex-shrink-0 snap-start">
      <div className="mx-auto mb-2 aspect-square w-[72px] overflow-hidden rounded-full bg-background-elevated">
        {profileUrl && !imageError ? (
          <img
            src={profileUrl}
            alt={name}
            className="h-full w-full object-cover"
            onError={() => setImageError(true)}
          />
        ) : (
          <div className="flex h-full w-full items-center justify-center">
            <User className="h-8 w-8 text-foreground-muted" />
          </div>
        )}
      </div>
      <Typography variant="caption" as="p" className="truncate text-center text-foreground-primary">
        {name}
      </Typography>
      {character && (
        <Typography variant="caption" as="p" className="truncate text-center text-xs">
          {character}
        </Typography>
      )}
    </div>
  );
}

interface CastRowProps {
  cast: CastMember[];
}

/**
 * Top-billed cast as a horizontally scrolling row.
 */
export function CastRow({ cast }: CastRowProps) {
  if (cast.length === 0) {
    return null;
  }

  return (
    <div>
      <Typography variant="label" as="h3" className="mb-3 block">
        Cast
      </Typography>
      <div className="flex snap-x gap-3 overflow-x-auto pb-2">
        {cast.map((member) => (
          <CastCard key={`${member.name}-${member.character}`} {...member} />
        ))}
      </div>
    </div>
  );
}
