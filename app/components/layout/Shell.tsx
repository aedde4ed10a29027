import type { ReactNode } from "react";

interface ShellProps {
  children: ReactNode;
  /** Center the content in the viewport, for error and status pages */
  centered?: boolean;
}

export function Shell({ children, centered = false }: ShellProps) {
  const layout = centered ? "flex items-center justify-center px-4 text-center" : "";
  return (
    <div className={`min-h-screen bg-background-primary text-foreground-primary ${layout}`}>
      {children}
    </div>
  );
}
