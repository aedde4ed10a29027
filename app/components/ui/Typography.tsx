import { type ReactNode } from "react";

type TypographyVariant =
  | "display"
  | "title"
  | "subtitle"
  | "body"
  | "caption"
  | "label";

type TypographyElement = "h1" | "h2" | "h3" | "h4" | "p" | "span";

interface TypographyProps {
  variant: TypographyVariant;
  as?: TypographyElement;
  className?: string;
  children: ReactNode;
}

const variantStyles: Record<TypographyVariant, string> = {
  // Page headings and the selected title
  display: "text-3xl md:text-4xl font-bold tracking-tight text-foreground-primary",
  // Section headings
  title: "text-xl md:text-2xl font-semibold text-foreground-primary",
  subtitle: "text-lg font-medium text-foreground-secondary",
  body: "text-base font-normal text-foreground-primary",
  // Metadata lines
  caption: "text-sm text-foreground-muted",
  label: "text-xs font-semibold uppercase tracking-wider text-foreground-secondary",
};

const defaultElements: Record<TypographyVariant, TypographyElement> = {
  display: "h1",
  title: "h2",
  subtitle: "h3",
  body: "p",
  caption: "span",
  label: "span",
};

export function Typography({
  variant,
  as,
  className = "",
  children,
}: TypographyProps) {
  const Component = as ?? defaultElements[variant];

  return (
    <Component className={`${variantStyles[variant]}${className ? ` ${className}` : ""}`}>
      {children}
    </Component>
  );
}
