import { describeError, type ServiceError } from "~/lib/errors";
import { Notice } from "./Notice";

interface ServiceErrorNoticeProps {
  error: ServiceError;
  /** Reload target offered for network failures */
  retryTo?: string;
  /** Shown instead of the generic text when nothing was found */
  emptyMessage?: string;
  className?: string;
}

/**
 * Renders a failed service call by kind: network failures get a retry link,
 * not-found reads as an empty state.
 */
export function ServiceErrorNotice({
  error,
  retryTo,
  emptyMessage,
  className,
}: ServiceErrorNoticeProps) {
  switch (error.kind) {
    case "not_found":
      return <Notice tone="info" message={emptyMessage ?? describeError(error)} className={className} />;
    case "network":
      return <Notice tone="error" message={describeError(error)} retryTo={retryTo} className={className} />;
    default:
      return <Notice tone="error" message={describeError(error)} className={className} />;
  }
}
