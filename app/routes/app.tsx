/**
 * Authenticated layout. Every route under /app needs a live session store
 * with a signed-in identity; requireUser() redirects to /auth/login otherwise.
 */

import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { Outlet, useLoaderData } from "@remix-run/react";
import { Header } from "~/components/layout";
import { toAccountSummary } from "~/lib/auth/account";
import { requireUser } from "~/lib/auth/user.server";
import { pageForPath } from "~/lib/pages";

export async function loader({ request }: LoaderFunctionArgs) {
  const { user, store } = await requireUser(request);
  const url = new URL(request.url);

  store.setSelection("currentPage", pageForPath(url.pathname));

  return json({
    account: toAccountSummary(user),
    query: url.searchParams.get("q") ?? "",
  });
}

export default function AppLayout() {
  const { account, query } = useLoaderData<typeof loader>();

  return (
    <div className="min-h-screen">
      <Header account={account} query={query} />

      {/* Offset for the fixed header */}
      <main className="pb-16 pt-24">
        <Outlet />
      </main>
    </div>
  );
}
