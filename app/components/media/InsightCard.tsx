import { Sparkles } from "lucide-react";
import { Typography } from "~/components/ui";
import type { InsightRecord } from "~/lib/session/types";

interface InsightCardProps {
  insight: InsightRecord;
}

/**
 * AI write-up for a title. The text is plain, line breaks preserved.
 */
export function InsightCard({ insight }: InsightCardProps) {
  return (
    <div className="rounded-md border border-accent-secondary/40 bg-accent-secondary/5 p-4">
      <div className="mb-2 flex items-center gap-2">
        <Sparkles className="h-4 w-4 text-accent-secondary" />
        <Typography variant="label">AI insights: {insight.title}</Typography>
      </div>
      <p className="whitespace-pre-line text-sm leading-relaxed text-foreground-secondary">
        {insight.text}
      </p>
    </div>
  );
}
