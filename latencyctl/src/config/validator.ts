import { loadAjv } from "../schema/ajv.js";
import type { LatencyConfig } from "../types/config.js";

/** Config schema — every field the extractor reads must be present. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "archive_reader", "extraction"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    archive_reader: {
      type: "object",
      required: ["command", "timeout_ms", "max_buffer_bytes"],
      properties: {
        command: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
        timeout_ms: { type: "integer", minimum: 1 },
        max_buffer_bytes: { type: "integer", minimum: 1024 },
      },
    },
    extraction: {
      type: "object",
      required: ["concurrency"],
      properties: {
        concurrency: { type: "integer", minimum: 1, maximum: 64 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: LatencyConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<LatencyConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
