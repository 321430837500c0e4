import { readConfig } from "@/lib/config";
import { loadSeedFile } from "@/lib/seed";
import { MemoryAnnotationStore } from "@/lib/store/memory";
import { SupabaseAnnotationStore } from "@/lib/store/supabase";
import type { AnnotationStore } from "@/lib/store/types";
import { getSupabaseAdmin } from "@/lib/supabase/admin";

let storePromise: Promise<AnnotationStore> | null = null;

async function createStore(): Promise<AnnotationStore> {
  const config = readConfig();
  if (config.store === "memory") {
    const seed = await loadSeedFile(config.seedPath);
    return new MemoryAnnotationStore(seed);
  }
  return new SupabaseAnnotationStore(getSupabaseAdmin());
}

/** Process-wide store, chosen by `ANNOTATION_STORE`. */
export function getStore(): Promise<AnnotationStore> {
  if (!storePromise) {
    storePromise = createStore().catch((error: unknown) => {
      storePromise = null;
      throw error;
    });
  }
  return storePromise;
}
