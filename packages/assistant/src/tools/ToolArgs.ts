import type { ToolInputSchema, ToolPropertyType } from "./ToolTypes.js";

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const matchesType = (value: unknown, type: ToolPropertyType): boolean => {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isObject(value);
  }
};

export type ArgumentCheck = { ok: true; args: Record<string, unknown> } | { ok: false; error: string };

/**
 * Checks arguments against a tool's declared schema: an object, every required
 * key present, and declared properties of the declared primitive type.
 * Undeclared keys pass through untouched.
 */
export const validateArgs = (args: unknown, schema: ToolInputSchema): ArgumentCheck => {
  const candidate = args === undefined || args === null ? {} : args;
  const required = schema.required ?? [];
  if (!isObject(candidate)) {
    return {
      ok: false,
      error: required.length
        ? `Invalid arguments: expected object with required keys ${required.join(", ")}`
        : "Invalid arguments: expected object",
    };
  }
  const missing = required.filter((key) => candidate[key] === undefined);
  if (missing.length) {
    return { ok: false, error: `Missing required arguments: ${missing.join(", ")}` };
  }
  for (const [key, property] of Object.entries(schema.properties)) {
    const value = candidate[key];
    if (value === undefined) continue;
    if (!matchesType(value, property.type)) {
      return { ok: false, error: `Invalid argument ${key}: expected ${property.type}` };
    }
    if (property.enum && typeof value === "string" && !property.enum.includes(value)) {
      return { ok: false, error: `Invalid argument ${key}: expected one of ${property.enum.join(", ")}` };
    }
    if (property.items && Array.isArray(value) && !value.every((item) => matchesType(item, property.items?.type ?? "string"))) {
      return { ok: false, error: `Invalid argument ${key}: expected ${property.items.type}[]` };
    }
  }
  return { ok: true, args: candidate };
};

export const stringArg = (args: Record<string, unknown>, key: string): string => {
  const value = args[key];
  if (typeof value !== "string") {
    throw new Error(`Invalid argument ${key}: expected string`);
  }
  return value;
};

export const optionalStringArg = (args: Record<string, unknown>, key: string): string | undefined => {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
};

export const optionalNumberArg = (args: Record<string, unknown>, key: string): number | undefined => {
  const value = args[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
};
