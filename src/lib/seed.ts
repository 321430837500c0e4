import { readFile } from "fs/promises";
import path from "path";
import YAML from "yaml";
import type { MemorySeed } from "@/lib/store/memory";
import type {
  Email,
  EmailMetadata,
  FailureMode,
  Json,
  Labeler,
  TraceRun,
} from "@/lib/types";

const SEED_EPOCH = "1970-01-01T00:00:00.000Z";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isJson(value: unknown): value is Json {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJson);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJson);
  }
  return false;
}

function requireString(record: Record<string, unknown>, key: string, where: string) {
  const value = record[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`${where}: "${key}" must be a non-empty string.`);
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string) {
  const value = record[key];
  return typeof value === "string" ? value : null;
}

function listOf(data: Record<string, unknown>, key: string) {
  const value = data[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`Seed "${key}" must be a list.`);
  }
  return value.map((item, index) => {
    if (!isPlainObject(item)) {
      throw new Error(`Seed ${key}[${index}] must be a mapping.`);
    }
    return item;
  });
}

function toMetadata(value: unknown, where: string): EmailMetadata {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isPlainObject(value)) {
    throw new Error(`${where}: "metadata" must be a mapping.`);
  }
  const metadata: EmailMetadata = {};
  Object.entries(value).forEach(([key, entry]) => {
    if (!isJson(entry)) {
      throw new Error(`${where}: metadata "${key}" is not a JSON value.`);
    }
    metadata[key] = entry;
  });
  return metadata;
}

/**
 * Parses the YAML seed used by the in-memory store. Timestamps may be omitted
 * and fall back to the epoch so seeded rows sort before anything created live.
 */
export function parseSeed(text: string): MemorySeed {
  const data: unknown = YAML.parse(text);
  if (!isPlainObject(data)) {
    throw new Error("Seed must be a YAML mapping.");
  }

  const runs: TraceRun[] = listOf(data, "runs").map((item, index) => {
    const where = `runs[${index}]`;
    return {
      run_id: requireString(item, "run_id", where),
      prompt_path: optionalString(item, "prompt_path"),
      prompt_checksum: optionalString(item, "prompt_checksum"),
      source_csv: optionalString(item, "source_csv"),
      model_name: optionalString(item, "model_name"),
      generated_at: optionalString(item, "generated_at") ?? SEED_EPOCH,
    };
  });

  const runIds = new Set(runs.map((run) => run.run_id));

  const emails: Email[] = listOf(data, "emails").map((item, index) => {
    const where = `emails[${index}]`;
    const runId = requireString(item, "run_id", where);
    if (!runIds.has(runId)) {
      throw new Error(`${where}: unknown run_id "${runId}".`);
    }
    return {
      email_hash: requireString(item, "email_hash", where),
      subject: optionalString(item, "subject"),
      body: optionalString(item, "body"),
      metadata: toMetadata(item.metadata, where),
      run_id: runId,
      ingested_at: optionalString(item, "ingested_at") ?? SEED_EPOCH,
    };
  });

  const labelers: Labeler[] = listOf(data, "labelers").map((item, index) => {
    const where = `labelers[${index}]`;
    const labelerId = requireString(item, "labeler_id", where);
    return {
      labeler_id: labelerId,
      name: optionalString(item, "name") ?? labelerId,
      email: optionalString(item, "email"),
      created_at: optionalString(item, "created_at") ?? SEED_EPOCH,
    };
  });

  const failureModes: FailureMode[] = listOf(data, "failure_modes").map(
    (item, index) => {
      const where = `failure_modes[${index}]`;
      const examples = Array.isArray(item.examples)
        ? item.examples.filter(
            (example): example is string => typeof example === "string"
          )
        : [];
      return {
        failure_mode_id: requireString(item, "failure_mode_id", where),
        slug: requireString(item, "slug", where),
        display_name: requireString(item, "display_name", where),
        definition: optionalString(item, "definition") ?? "",
        examples,
        created_at: optionalString(item, "created_at") ?? SEED_EPOCH,
      };
    }
  );

  return { runs, emails, labelers, failureModes };
}

export async function loadSeedFile(seedPath: string): Promise<MemorySeed> {
  const absolute = path.isAbsolute(seedPath)
    ? seedPath
    : path.join(process.cwd(), seedPath);
  const text = await readFile(absolute, "utf-8");
  return parseSeed(text);
}
