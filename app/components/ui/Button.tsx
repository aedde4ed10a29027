import { type ButtonHTMLAttributes, type ReactNode } from "react";

type ButtonVariant = "primary" | "secondary" | "ghost" | "danger";
type ButtonSize = "sm" | "md" | "lg";

interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  size?: ButtonSize;
  children: ReactNode;
}

const focusRing =
  "focus:ring-2 focus:ring-offset-2 focus:ring-offset-background-primary focus:outline-none";

const variantStyles: Record<ButtonVariant, string> = {
  // Coral background for the main action of a form
  primary: [
    "bg-accent-primary text-accent-foreground",
    "hover:bg-accent-hover hover:scale-[1.02]",
    `focus:ring-accent-primary ${focusRing}`,
  ].join(" "),
  // Teal outline for secondary actions
  secondary: [
    "bg-transparent text-accent-secondary border border-accent-secondary",
    "hover:bg-accent-secondary/10 hover:scale-[1.02]",
    `focus:ring-accent-secondary ${focusRing}`,
  ].join(" "),
  ghost: [
    "bg-transparent text-foreground-secondary",
    "hover:bg-white/10 hover:text-foreground-primary",
    `focus:ring-white/50 ${focusRing}`,
  ].join(" "),
  danger: [
    "bg-transparent text-status-error border border-status-error/60",
    "hover:bg-status-error/10",
    `focus:ring-status-error ${focusRing}`,
  ].join(" "),
};

const sizeStyles: Record<ButtonSize, string> = {
  sm: "px-3 py-1.5 text-sm",
  md: "px-4 py-2 text-base",
  lg: "px-6 py-3 text-lg",
};

export function Button({
  variant = "primary",
  size = "md",
  className = "",
  type = "button",
  children,
  ...props
}: ButtonProps) {
  const baseStyles =
    "inline-flex items-center justify-center gap-2 align-middle font-medium rounded-md origin-center transition-[transform,background-color,box-shadow] duration-200 active:scale-[0.98] disabled:cursor-not-allowed disabled:opacity-50 disabled:hover:scale-100";

  return (
    <button
      type={type}
      className={`${baseStyles} ${variantStyles[variant]} ${sizeStyles[size]}${className ? ` ${className}` : ""}`}
      {...props}
    >
      {children}
    </button>
  );
}
