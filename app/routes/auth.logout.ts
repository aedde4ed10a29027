/**
 * Logout route - clears the session's state store and the cookie.
 */

import type { ActionFunctionArgs } from "@remix-run/node";
import { redirect } from "@remix-run/node";
import { endUserSession } from "~/lib/auth/session.server";
import { getCurrentUser } from "~/lib/auth/user.server";
import { getServices } from "~/lib/services.server";

export async function action({ request }: ActionFunctionArgs) {
  const context = await getCurrentUser(request);
  if (context) {
    getServices().auth.signOut(context.user);
  }
  // Destroying the store in the registry runs clearOnSignOut()
  return endUserSession(request);
}

export async function loader() {
  // Logout should only be POST - redirect GET requests to home
  return redirect("/");
}
