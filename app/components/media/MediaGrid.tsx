import type { ReactNode } from "react";
import { Typography } from "~/components/ui";

interface MediaGridProps {
  title: string;
  /** Right-aligned text next to the heading, e.g. a result count */
  aside?: string;
  children: ReactNode;
}

export function MediaGrid({ title, aside, children }: MediaGridProps) {
  return (
    <section className="mb-10">
      <div className="mb-4 flex items-baseline justify-between gap-4">
        <Typography variant="title">{title}</Typography>
        {aside && <Typography variant="caption">{aside}</Typography>}
      </div>
      <div className="grid grid-cols-2 gap-4 sm:grid-cols-3 md:grid-cols-4 lg:grid-cols-6">
        {children}
      </div>
    </section>
  );
}
