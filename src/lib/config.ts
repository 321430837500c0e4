export type StoreKind = "supabase" | "memory";

export type AppConfig = {
  store: StoreKind;
  seedPath: string;
};

const DEFAULT_SEED_PATH = "data/demo-seed.yaml";

export function readConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const rawStore = (env.ANNOTATION_STORE ?? "supabase").trim().toLowerCase();
  if (rawStore !== "supabase" && rawStore !== "memory") {
    throw new Error(
      `ANNOTATION_STORE must be "supabase" or "memory", got "${rawStore}"`
    );
  }

  return {
    store: rawStore,
    seedPath: env.ANNOTATION_SEED_PATH?.trim() || DEFAULT_SEED_PATH,
  };
}

export function readSupabaseCredentials(env: Partial<NodeJS.ProcessEnv> = process.env) {
  const url = env.NEXT_PUBLIC_SUPABASE_URL ?? "";
  const secret = env.SUPABASE_SECRET_KEY ?? "";

  if (!url || !secret) {
    throw new Error("Missing NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SECRET_KEY");
  }

  return { url, secret };
}
