import { Form } from "@remix-run/react";
import { LogOut } from "lucide-react";

/**
 * Posts to /auth/logout, which tears down the session store.
 */
export function LogoutButton({ className = "", role }: { className?: string; role?: string }) {
  return (
    <Form method="post" action="/auth/logout">
      <button type="submit" role={role} className={`flex w-full items-center gap-3 text-sm ${className}`}>
        <LogOut className="h-4 w-4" />
        Log Out
      </button>
    </Form>
  );
}
