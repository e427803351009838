import { cookies } from "next/headers";
import { createServerClient, type SetAllCookies } from "@supabase/ssr";
import { ConfigurationError } from "@/lib/study-errors";

export function requireEnv(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) throw new ConfigurationError(`${name} is not set`);
  return value;
}

// Request-scoped client carrying the caller's auth cookies; used to resolve the user.
export async function supabaseServer() {
  const cookieStore = await cookies();
  return createServerClient(requireEnv("NEXT_PUBLIC_SUPABASE_URL"), requireEnv("NEXT_PUBLIC_SUPABASE_ANON_KEY"), {
    cookies: {
      getAll() {
        return cookieStore.getAll();
      },
      setAll(cookiesToSet: Parameters<SetAllCookies>[0]) {
        try {
          cookiesToSet.forEach(({ name, value, options }) => cookieStore.set(name, value, options));
        } catch (err) {
          // Cookies are read-only outside route handlers and server actions.
          console.warn("[supabase-server] cookie write skipped", { error: err instanceof Error ? err.message : String(err) });
        }
      },
    },
  });
}
