/**
 * Login route - email/password sign in and account creation.
 */

import { useState } from "react";
import type { ActionFunctionArgs, LoaderFunctionArgs, MetaFunction } from "@remix-run/node";
import { json, redirect } from "@remix-run/node";
import { Form, useActionData, useLoaderData, useNavigation } from "@remix-run/react";
import { Clapperboard, Loader2 } from "lucide-react";
import { Button, Notice, Typography } from "~/components/ui";
import { createUserSession } from "~/lib/auth/session.server";
import { getCurrentUser } from "~/lib/auth/user.server";
import { describeError } from "~/lib/errors";
import { formString } from "~/lib/forms";
import { createLogger } from "~/lib/logger.server";
import { getServices } from "~/lib/services.server";
import { getSessionRegistry } from "~/lib/session/registry.server";

const logger = createLogger("Login");

type AuthMode = "sign-in" | "sign-up";

interface ActionData {
  mode: AuthMode;
  email: string;
  error: string;
}

export const meta: MetaFunction = () => [{ title: "Sign in | CineBase" }];

export async function loader({ request }: LoaderFunctionArgs) {
  // If already signed in, go straight to the app
  const context = await getCurrentUser(request);
  if (context) {
    return redirect("/app");
  }
  return json({ expired: new URL(request.url).searchParams.has("expired") });
}

export async function action({ request }: ActionFunctionArgs) {
  const formData = await request.formData();
  const mode: AuthMode = formString(formData, "intent") === "sign-up" ? "sign-up" : "sign-in";
  const email = formString(formData, "email").trim();
  const password = formString(formData, "password");

  if (!email || !password) {
    return json<ActionData>(
      { mode, email, error: "Enter your email and password." },
      { status: 400 }
    );
  }

  const { auth, database } = getServices();
  const result =
    mode === "sign-up"
      ? await auth.signUp({ email, password })
      : await auth.signIn({ email, password });

  if (!result.success) {
    return json<ActionData>(
      { mode, email, error: describeError(result.error) },
      { status: result.error.kind === "auth" ? 401 : 502 }
    );
  }

  const user = result.data;
  if (mode === "sign-up") {
    const profile = await database.initProfile(user);
    if (!profile.success) {
      logger.warn(`Could not initialise profile for ${user.identity}`, {
        message: profile.error.message,
      });
    }
  }

  const store = getSessionRegistry().create();
  store.setSelection("identity", user);
  store.setSelection("currentPage", "home");
  return createUserSession(request, store, "/app");
}

export default function Login() {
  const { expired } = useLoaderData<typeof loader>();
  const actionData = useActionData<typeof action>();
  const navigation = useNavigation();
  const isSubmitting = navigation.state === "submitting";
  const [mode, setMode] = useState<AuthMode>(actionData?.mode ?? "sign-in");

  const tabClass = (tab: AuthMode) =>
    `flex-1 rounded-md px-4 py-2 text-sm font-medium transition-colors ${
      mode === tab
        ? "bg-background-elevated text-foreground-primary"
        : "text-foreground-muted hover:text-foreground-primary"
    }`;

  return (
    <main className="flex min-h-screen flex-col items-center justify-center">
      <div className="w-full max-w-md space-y-8 px-4">
        <div className="text-center">
          <Clapperboard className="mx-auto mb-4 h-12 w-12 text-accent-primary" />
          <Typography variant="display">Welcome to CineBase</Typography>
          <p className="mt-3 text-foreground-muted">
            Trending picks, your watchlist and AI insights in one place.
          </p>
        </div>

        <div className="rounded-lg bg-background-secondary p-6 shadow-xl">
          <div className="mb-6 flex gap-2" role="tablist">
            <button type="button" role="tab" aria-selected={mode === "sign-in"} className={tabClass("sign-in")} onClick={() => setMode("sign-in")}>
              Sign In
            </button>
            <button type="button" role="tab" aria-selected={mode === "sign-up"} className={tabClass("sign-up")} onClick={() => setMode("sign-up")}>
              Create Account
            </button>
          </div>

          <Form method="post" className="space-y-4">
            <label className="block">
              <Typography variant="label">Email</Typography>
              <input
                type="email"
                name="email"
                autoComplete="email"
                defaultValue={actionData?.email}
                required
                className="mt-1 w-full rounded-md border border-border-emphasis bg-background-elevated px-3 py-2 text-foreground-primary focus:border-accent-primary focus:outline-none"
              />
            </label>
            <label className="block">
              <Typography variant="label">Password</Typography>
              <input
                type="password"
                name="password"
                autoComplete={mode === "sign-up" ? "new-password" : "current-password"}
                required
                className="mt-1 w-full rounded-md border border-border-emphasis bg-background-elevated px-3 py-2 text-foreground-primary focus:border-accent-primary focus:outline-none"
              />
            </label>

            {expired && !actionData && (
              <Notice tone="info" message="Your session has expired. Please sign in again." />
            )}
            {actionData?.error && actionData.mode === mode && (
              <Notice tone="error" message={actionData.error} />
            )}

            <Button type="submit" name="intent" value={mode} size="lg" className="w-full" disabled={isSubmitting}>
              {isSubmitting && <Loader2 className="h-5 w-5 animate-spin" />}
              {mode === "sign-up" ? "Create Account" : "Sign In"}
            </Button>
          </Form>
        </div>
      </div>
    </main>
  );
}
