import { promises as fs } from "node:fs";

import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import type { HeuristicThresholds, MetricsSnapshot } from "lib/report/types.js";

import { SNAPSHOT_SCHEMA_PATH, THRESHOLDS_SCHEMA_PATH } from "../constants.js";

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
addFormats(ajv);

let thresholdsValidator: ValidateFunction<Partial<HeuristicThresholds>> | null = null;
let snapshotValidator: ValidateFunction<MetricsSnapshot> | null = null;

export interface ValidationResult<T> {
  value: T | null;
  errors: string[];
}

export async function validateThresholds(input: unknown): Promise<ValidationResult<Partial<HeuristicThresholds>>> {
  if (!thresholdsValidator) {
    thresholdsValidator = ajv.compile<Partial<HeuristicThresholds>>(await loadSchema(THRESHOLDS_SCHEMA_PATH));
  }
  return runValidator(thresholdsValidator, input);
}

export async function validateSnapshot(input: unknown): Promise<ValidationResult<MetricsSnapshot>> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<MetricsSnapshot>(await loadSchema(SNAPSHOT_SCHEMA_PATH));
  }
  return runValidator(snapshotValidator, input);
}

function runValidator<T>(validator: ValidateFunction<T>, input: unknown): ValidationResult<T> {
  if (validator(input)) {
    return { value: input, errors: [] };
  }
  return { value: null, errors: formatErrors(validator.errors) };
}

// Schema paths are relative to the repository root, three levels above this module.
async function loadSchema(path: string): Promise<SchemaObject> {
  const raw = await fs.readFile(new URL(`../../../${path}`, import.meta.url), "utf8");
  return JSON.parse(raw) as SchemaObject;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
