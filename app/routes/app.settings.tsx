/**
 * Settings page - account details, profile and security updates, watchlist
 * reset and AI insights for any title.
 * GET/POST /app/settings
 */

import type { ReactNode } from "react";
import type { ActionFunctionArgs, LoaderFunctionArgs, MetaFunction } from "@remix-run/node";
import { json } from "@remix-run/node";
import { Form, useActionData, useLoaderData, useNavigation } from "@remix-run/react";
import { Loader2, Sparkles, Trash2 } from "lucide-react";
import { Container } from "~/components/layout";
import { InsightCard } from "~/components/media";
import { Button, Notice, Typography, type NoticeData } from "~/components/ui";
import { toAccountSummary } from "~/lib/auth/account";
import type { AccountUpdate } from "~/lib/auth/types";
import { endSessionOnAuthError, requireUser } from "~/lib/auth/user.server";
import { getTitleInsight } from "~/lib/catalog.server";
import { describeError } from "~/lib/errors";
import { formString } from "~/lib/forms";
import { getServices } from "~/lib/services.server";

export const meta: MetaFunction = () => {
  return [{ title: "Settings | CineBase" }];
};

type SettingsSection = "profile" | "security" | "watchlist" | "insight";

interface ActionData {
  section: SettingsSection;
  notice: NoticeData | null;
}

function success(section: SettingsSection, message: string) {
  return json<ActionData>({ section, notice: { tone: "success", message } });
}

function failure(section: SettingsSection, message: string, status = 200) {
  return json<ActionData>({ section, notice: { tone: "error", message } }, { status });
}

export async function loader({ request }: LoaderFunctionArgs) {
  const { user, store } = await requireUser(request);
  const lastInsight = store.getSelection("lastAiResult");

  return json({
    account: toAccountSummary(user),
    insightsEnabled: getServices().insight !== null,
    // Title insights carry no media kind; those for a selected title do
    titleInsight: lastInsight && !lastInsight.kind ? lastInsight : null,
  });
}

export async function action({ request }: ActionFunctionArgs) {
  const { user, store } = await requireUser(request);
  const { auth, database, metadata, insight } = getServices();
  const formData = await request.formData();

  switch (formString(formData, "intent")) {
    case "update-profile": {
      const displayName = formString(formData, "displayName").trim();
      const email = formString(formData, "email").trim();
      const update: AccountUpdate = { displayName };
      if (email && email !== user.email) {
        update.email = email;
      }

      const result = await auth.updateAccount(user, update);
      if (!result.success) {
        await endSessionOnAuthError(request, result.error);
        return failure("profile", describeError(result.error));
      }
      store.setSelection("identity", result.data);

      const profile = await database.updateProfile(result.data, { name: displayName });
      if (!profile.success) {
        await endSessionOnAuthError(request, profile.error);
        return failure("profile", describeError(profile.error));
      }
      return success("profile", "Profile updated.");
    }

    case "update-security": {
      const email = formString(formData, "newEmail").trim();
      const password = formString(formData, "newPassword");
      if (!email && !password) {
        return failure("security", "Enter a new email or password.", 400);
      }

      const update: AccountUpdate = {};
      if (email) update.email = email;
      if (password) update.password = password;

      const result = await auth.updateAccount(user, update);
      if (!result.success) {
        await endSessionOnAuthError(request, result.error);
        return failure("security", describeError(result.error));
      }
      store.setSelection("identity", result.data);
      return success("security", "Account updated (email/password).");
    }

    case "clear-watchlist": {
      const result = await database.clearEntries(user);
      if (!result.success) {
        await endSessionOnAuthError(request, result.error);
        return failure("watchlist", describeError(result.error));
      }
      return success("watchlist", "Cleared watchlist.");
    }

    case "title-insight": {
      const result = await getTitleInsight(
        store,
        metadata,
        insight,
        formString(formData, "title"),
        formString(formData, "plot")
      );
      if (!result.success) {
        return failure("insight", describeError(result.error));
      }
      return json<ActionData>({ section: "insight", notice: null });
    }

    default:
      return failure("profile", "Unknown action.", 400);
  }
}

const inputClass =
  "mt-1 w-full rounded-md border border-border-emphasis bg-background-primary px-3 py-2 text-foreground-primary placeholder:text-foreground-muted focus:border-accent-primary focus:outline-none";

function SettingsCard({
  title,
  description,
  children,
}: {
  title: string;
  description?: string;
  children: ReactNode;
}) {
  return (
    <section className="mt-6 rounded-lg border border-border-subtle bg-background-secondary p-6">
      <div className="mb-4">
        <Typography variant="subtitle" as="h2" className="mb-1 text-foreground-primary">
          {title}
        </Typography>
        {description && (
          <Typography variant="caption" as="p">
            {description}
          </Typography>
        )}
      </div>
      {children}
    </section>
  );
}

function Field({ label, children }: { label: string; children: ReactNode }) {
  return (
    <label className="block">
      <Typography variant="label">{label}</Typography>
      {children}
    </label>
  );
}

export default function SettingsPage() {
  const { account, insightsEnabled, titleInsight } = useLoaderData<typeof loader>();
  const actionData = useActionData<typeof action>();
  const navigation = useNavigation();
  const pendingIntent =
    navigation.state === "submitting" ? navigation.formData?.get("intent") : null;

  const noticeFor = (section: SettingsSection) =>
    actionData?.section === section && actionData.notice ? (
      <Notice tone={actionData.notice.tone} message={actionData.notice.message} className="mt-4" />
    ) : null;

  return (
    <Container size="narrow">
      <Typography variant="display">Settings</Typography>

      <SettingsCard title="Account">
        <dl className="grid grid-cols-[max-content_1fr] gap-x-6 gap-y-2 text-sm">
          <dt className="text-foreground-muted">Email</dt>
          <dd className="text-foreground-primary">{account.email}</dd>
          <dt className="text-foreground-muted">Display name</dt>
          <dd className="text-foreground-primary">{account.displayName || "Not set"}</dd>
          <dt className="text-foreground-muted">User ID</dt>
          <dd className="break-all font-mono text-xs text-foreground-secondary">{account.identity}</dd>
        </dl>
      </SettingsCard>

      <SettingsCard title="Profile">
        <Form method="post" className="space-y-4">
          <Field label="Display name">
            <input type="text" name="displayName" defaultValue={account.displayName ?? ""} className={inputClass} />
          </Field>
          <Field label="Email">
            <input type="email" name="email" defaultValue={account.email} className={inputClass} />
          </Field>
          <Button type="submit" name="intent" value="update-profile" disabled={pendingIntent === "update-profile"}>
            Save profile
          </Button>
        </Form>
        {noticeFor("profile")}
      </SettingsCard>

      <SettingsCard title="Security" description="Change your sign-in email, password or both.">
        <Form method="post" className="space-y-4">
          <Field label="New email">
            <input type="email" name="newEmail" autoComplete="email" className={inputClass} />
          </Field>
          <Field label="New password">
            <input type="password" name="newPassword" autoComplete="new-password" className={inputClass} />
          </Field>
          <Button type="submit" name="intent" value="update-security" variant="secondary" disabled={pendingIntent === "update-security"}>
            Update account
          </Button>
        </Form>
        {noticeFor("security")}
      </SettingsCard>

      <SettingsCard title="Watchlist" description="Remove every title from your watchlist.">
        <Form method="post">
          <Button type="submit" name="intent" value="clear-watchlist" variant="danger" disabled={pendingIntent === "clear-watchlist"}>
            <Trash2 className="h-4 w-4" />
            Clear watchlist
          </Button>
        </Form>
        {noticeFor("watchlist")}
      </SettingsCard>

      <SettingsCard
        title="AI insights"
        description="Get a summary, trivia and recommendations for any title. Leave the plot blank to look it up."
      >
        {insightsEnabled ? (
          <Form method="post" className="space-y-4">
            <Field label="Title">
              <input type="text" name="title" placeholder="Heat" className={inputClass} />
            </Field>
            <Field label="Plot (optional)">
              <textarea name="plot" rows={3} className={inputClass} />
            </Field>
            <Button type="submit" name="intent" value="title-insight" disabled={pendingIntent === "title-insight"}>
              {pendingIntent === "title-insight" ? (
                <Loader2 className="h-4 w-4 animate-spin" />
              ) : (
                <Sparkles className="h-4 w-4" />
              )}
              Get AI insights
            </Button>
          </Form>
        ) : (
          <Notice tone="info" message="AI insights are not configured on this server." />
        )}
        {noticeFor("insight")}
        {titleInsight && (
          <div className="mt-4">
            <InsightCard insight={titleInsight} />
          </div>
        )}
      </SettingsCard>
    </Container>
  );
}
