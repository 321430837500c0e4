import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { readSupabaseCredentials } from "@/lib/config";

let adminClient: SupabaseClient | null = null;

export function getSupabaseAdmin(): SupabaseClient {
  if (typeof window !== "undefined") {
    throw new Error("getSupabaseAdmin should never be used in the browser");
  }

  if (adminClient) {
    return adminClient;
  }

  const { url, secret } = readSupabaseCredentials();
  adminClient = createClient(url, secret, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  return adminClient;
}
