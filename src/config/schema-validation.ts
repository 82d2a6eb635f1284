import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, Options, ValidateFunction } from "ajv";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { getAssetRoot } from "../utils/asset-root.js";
import type { GcLabConfigFile } from "./types.js";

// ajv ships CommonJS whose default export NodeNext resolution types as the module object.
const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => {
  compile: <T>(schema: unknown) => ValidateFunction<T>;
};

const ajv = new Ajv2020Ctor({ allErrors: true, strict: true });

const compileSchema = <T>(fileName: string): ValidateFunction<T> => {
  const path = join(getAssetRoot(), "schemas", fileName);
  return ajv.compile<T>(JSON.parse(readFileSync(path, "utf8")));
};

export const validateConfig = compileSchema<GcLabConfigFile>("config.schema.json");

const paramText = (error: ErrorObject, key: string): string | null => {
  const value: unknown = Reflect.get(error.params, key);
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(String).join(", ");
  }
  return null;
};

/** Names the offending key or the allowed values where ajv's message leaves them out. */
const describeError = (error: ErrorObject): string => {
  const message = error.message ?? "is invalid";
  const extra =
    error.keyword === "additionalProperties"
      ? paramText(error, "additionalProperty")
      : error.keyword === "enum"
        ? paramText(error, "allowedValues")
        : null;
  return extra === null ? message : `${message} (${extra})`;
};

export const formatAjvErrors = (
  label: string,
  errors: ErrorObject[] | null | undefined
): string[] =>
  (errors ?? []).map((error) => `${label}${error.instancePath}: ${describeError(error)}`);
