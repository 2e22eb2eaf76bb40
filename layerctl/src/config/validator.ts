import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { LayerConfig } from "../types/config.js";

export type ConfigValidationResult =
  | { valid: true; config: LayerConfig; errors: null }
  | { valid: false; errors: string };

/** Requirements that depend on the chosen backends. */
export function checkBackends(config: LayerConfig): string[] {
  const errors: string[] = [];

  if (config.storage.backend === "s3" && config.storage.bucket.length === 0) {
    errors.push("storage.bucket is required for the s3 backend");
  }
  if (config.storage.backend === "file" && !config.storage.root_dir) {
    errors.push("storage.root_dir is required for the file backend");
  }
  if (config.ledger.backend === "dynamodb" && config.ledger.table.length === 0) {
    errors.push("ledger.table is required for the dynamodb backend");
  }
  if (config.ledger.backend === "file" && !config.ledger.root_dir) {
    errors.push("ledger.root_dir is required for the file backend");
  }

  return errors;
}

/** Validate a merged config document against the config schema. */
export async function validateConfig(doc: unknown, registry?: SchemaRegistry): Promise<ConfigValidationResult> {
  const reg = registry ?? (await createRegistry());
  const res = await reg.check<LayerConfig>("config", doc);
  if (!res.valid) return { valid: false, errors: res.errors };

  const backendErrors = checkBackends(res.value);
  if (backendErrors.length > 0) return { valid: false, errors: backendErrors.join("; ") };

  return { valid: true, config: res.value, errors: null };
}
