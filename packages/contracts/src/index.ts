import { existsSync, readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ErrorObject, ValidateFunction } from "ajv";
import { BatchError } from "@busco-tracker/shared";

export type ValidateResult =
  | { ok: true }
  | { ok: false; errors: Array<{ path: string; message: string }> };

const SCHEMA_FILES = {
  catalogRow: "catalog-row.schema.json",
  successRow: "success-row.schema.json",
  outcomeRow: "outcome-row.schema.json",
  dispatchPlan: "dispatch-plan.schema.json",
} as const;

export type SchemaName = keyof typeof SCHEMA_FILES;

const SCHEMA_DIR = "docs/contracts/schemas";

const require = createRequire(import.meta.url);
const Ajv2020 = require("ajv/dist/2020").default as new (options: Record<string, unknown>) => {
  addSchema: (schema: unknown, key: string) => unknown;
  getSchema: (key: string) => ValidateFunction | undefined;
};

// Schemas are registered under their short name the first time they are used.
const ajv = new Ajv2020({ allErrors: true, strict: false });
const registered = new Set<SchemaName>();

let schemaDir: string | undefined;

function locateSchemaDir(): string {
  if (schemaDir) return schemaDir;
  let current = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(current, SCHEMA_DIR))) {
    const parent = dirname(current);
    if (parent === current) {
      throw new Error(`${SCHEMA_DIR} not found above ${fileURLToPath(import.meta.url)}`);
    }
    current = parent;
  }
  schemaDir = join(current, SCHEMA_DIR);
  return schemaDir;
}

function validatorFor(name: SchemaName): ValidateFunction {
  if (!registered.has(name)) {
    const schema: unknown = JSON.parse(readFileSync(join(locateSchemaDir(), SCHEMA_FILES[name]), "utf-8"));
    ajv.addSchema(schema, name);
    registered.add(name);
  }
  const validator = ajv.getSchema(name);
  if (!validator) {
    throw new Error(`schema ${name} did not compile`);
  }
  return validator;
}

function describeErrors(errors: ErrorObject[] | null | undefined): Array<{ path: string; message: string }> {
  return (errors ?? []).map((error) => ({
    path: error.instancePath || error.schemaPath,
    message: error.message ?? "Invalid value",
  }));
}

export function validateSchema(name: SchemaName, payload: unknown): ValidateResult {
  const validator = validatorFor(name);
  return validator(payload) ? { ok: true } : { ok: false, errors: describeErrors(validator.errors) };
}

export function isValid(name: SchemaName, payload: unknown): boolean {
  return validatorFor(name)(payload) === true;
}

/** Throws a `schema_violation` BatchError carrying the failing paths. */
export function ensureSchema(name: SchemaName, payload: unknown): void {
  const result = validateSchema(name, payload);
  if (!result.ok) {
    throw new BatchError("schema_violation", `Schema validation failed for ${name}: ${JSON.stringify(result.errors)}`, {
      schema: name,
      errors: result.errors,
    });
  }
}
