import type { ReactNode } from "react";

type ContainerSize = "narrow" | "default" | "wide";

interface ContainerProps {
  children: ReactNode;
  size?: ContainerSize;
  className?: string;
}

const sizeClasses: Record<ContainerSize, string> = {
  narrow: "max-w-3xl", // forms
  default: "max-w-7xl", // 1280px
  wide: "max-w-screen-2xl", // 1536px
};

/**
 * Centered max-width container with responsive horizontal padding.
 */
export function Container({
  children,
  size = "default",
  className = "",
}: ContainerProps) {
  return (
    <div
      className={`mx-auto w-full px-4 sm:px-6 lg:px-8 ${sizeClasses[size]} ${className}`}
    >
      {children}
    </div>
  );
}
