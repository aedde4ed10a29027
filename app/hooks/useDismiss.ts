import { useEffect, type RefObject } from "react";

/**
 * While `active`, call `onDismiss` on Escape, and on a press outside
 * `containerRef` when one is given.
 */
export function useDismiss(
  active: boolean,
  onDismiss: () => void,
  containerRef?: RefObject<HTMLElement>
) {
  useEffect(() => {
    if (!active) return;

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === "Escape") onDismiss();
    };
    const onPointerDown = (e: MouseEvent) => {
      const container = containerRef?.current;
      if (container && e.target instanceof Node && !container.contains(e.target)) {
        onDismiss();
      }
    };

    document.addEventListener("keydown", onKeyDown);
    document.addEventListener("mousedown", onPointerDown);
    return () => {
      document.removeEventListener("keydown", onKeyDown);
      document.removeEventListener("mousedown", onPointerDown);
    };
  }, [active, onDismiss, containerRef]);
}
