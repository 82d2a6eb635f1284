import { createHash } from "node:crypto";

import { ConfigurationError } from "../core/errors.js";

export const sha256Hex = (data: string | Buffer): string =>
  createHash("sha256").update(data).digest("hex");

/**
 * Rebuilds a JSON-compatible value with object keys in code-point order and
 * undefined members dropped, so equal plans serialize to equal bytes.
 */
const normalize = (value: unknown, path: string): unknown => {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new ConfigurationError(`Cannot fingerprint non-finite number at ${path}`);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => normalize(item, `${path}[${index}]`));
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const member: unknown = Reflect.get(value, key);
    if (member !== undefined) {
      sorted[key] = normalize(member, `${path}.${key}`);
    }
  }
  return sorted;
};

export const stableJson = (value: unknown): string =>
  JSON.stringify(normalize(value, "$")) ?? "null";

/** SHA-256 of the stable serialization; the plan hash recorded in every manifest. */
export const fingerprint = (value: unknown): string => sha256Hex(stableJson(value));
