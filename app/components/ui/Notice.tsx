import { Link } from "@remix-run/react";
import { AlertTriangle, CheckCircle2, Info } from "lucide-react";

export type NoticeTone = "success" | "error" | "info";

/**
 * What an action hands back for the page to show.
 */
export interface NoticeData {
  tone: NoticeTone;
  message: string;
}

interface NoticeProps extends NoticeData {
  /** Where the "Try again" link points; omitted for no link */
  retryTo?: string;
  className?: string;
}

const toneStyles: Record<NoticeTone, string> = {
  success: "border-status-success/40 bg-status-success/10 text-status-success",
  error: "border-status-error/40 bg-status-error/10 text-status-error",
  info: "border-accent-secondary/40 bg-accent-secondary/10 text-foreground-secondary",
};

const toneIcons = {
  success: CheckCircle2,
  error: AlertTriangle,
  info: Info,
} satisfies Record<NoticeTone, unknown>;

export function Notice({ tone, message, retryTo, className = "" }: NoticeProps) {
  const Icon = toneIcons[tone];

  return (
    <div
      role={tone === "error" ? "alert" : "status"}
      className={`flex items-start gap-3 rounded-md border px-4 py-3 text-sm ${toneStyles[tone]} ${className}`}
    >
      <Icon className="mt-0.5 h-4 w-4 flex-shrink-0" />
      <p className="flex-1">{message}</p>
      {retryTo && (
        <Link
          to={retryTo}
          reloadDocument
          className="font-semibold underline underline-offset-2 hover:text-foreground-primary"
        >
          Try again
        </Link>
      )}
    </div>
  );
}
