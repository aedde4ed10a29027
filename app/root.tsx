import {
  isRouteErrorResponse,
  Links,
  Meta,
  Outlet,
  Scripts,
  ScrollRestoration,
  useRouteError,
} from "@remix-run/react";
import type { LinksFunction } from "@remix-run/node";
import { json } from "@remix-run/node";

import "./tailwind.css";
import { Shell } from "~/components/layout";
import { runStartupChecks } from "~/lib/startup.server";

export async function loader() {
  // No-op after the first success; covers `remix vite:dev`, which skips server.ts
  runStartupChecks();
  return json({});
}

export const links: LinksFunction = () => [
  { rel: "preconnect", href: "https://fonts.googleapis.com" },
  {
    rel: "preconnect",
    href: "https://fonts.gstatic.com",
    crossOrigin: "anonymous",
  },
  {
    rel: "stylesheet",
    href: "https://fonts.googleapis.com/css2?family=Inter:ital,opsz,wght@0,14..32,100..900;1,14..32,100..900&display=swap",
  },
];

export function Layout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" className="dark bg-background-primary">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1, viewport-fit=cover" />
        <Meta />
        <Links />
      </head>
      <body className="antialiased bg-background-primary text-foreground-primary">
        {children}
        <ScrollRestoration />
        <Scripts />
      </body>
    </html>
  );
}

export default function App() {
  return (
    <Shell>
      <Outlet />
    </Shell>
  );
}

export function ErrorBoundary() {
  const error = useRouteError();

  let title = "Something went wrong";
  let message = "An unexpected error occurred.";

  if (isRouteErrorResponse(error)) {
    title = `${error.status} ${error.statusText}`;
    message = error.status === 404 ? "The page you requested could not be found." : message;
  } else if (error instanceof Error) {
    message = error.message;
  }

  return (
    <Shell centered>
      <div>
        <h1 className="text-4xl font-bold">{title}</h1>
        <p className="mt-4 text-foreground-muted">{message}</p>
        <a
          href="/app"
          className="mt-8 inline-block rounded-md bg-accent-primary px-6 py-3 text-accent-foreground transition-colors hover:bg-accent-hover"
        >
          Back to CineBase
        </a>
      </div>
    </Shell>
  );
}
