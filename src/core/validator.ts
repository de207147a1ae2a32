import { z } from "zod";
import { SchemaViolationError } from "./errors.js";
import type { JsonValue } from "./response_parser.js";

export type StringField = {
  type: "string";
  oneOf?: readonly string[];
  /** Exact value, e.g. a page discriminator. */
  equals?: string;
  nonEmpty?: boolean;
  optional?: boolean;
};
export type NumberField = { type: "number"; min?: number; optional?: boolean };
export type BooleanField = { type: "boolean"; optional?: boolean };
export type ListField = {
  type: "list";
  minItems?: number;
  maxItems?: number;
  items?: FieldSpec;
  optional?: boolean;
};
export type MappingField = {
  type: "mapping";
  fields?: Record<string, FieldSpec>;
  optional?: boolean;
};

export type FieldSpec = StringField | NumberField | BooleanField | ListField | MappingField;

export type KindSpec = {
  kind: string;
  fields: Record<string, FieldSpec>;
};

export type ValidatedOutput = {
  readonly kind: string;
  readonly value: JsonValue;
};

export type CompiledKind = {
  kind: string;
  /** Top-level presence and bare type; value constraints wait for `full`. */
  shallow: z.ZodTypeAny;
  /** Item counts on top-level lists. */
  counts: z.ZodTypeAny;
  /** Complete nested shape. */
  full: z.ZodTypeAny;
};

function optionalIf(schema: z.ZodTypeAny, field: FieldSpec): z.ZodTypeAny {
  return field.optional ? schema.optional() : schema;
}

function stringSchema(field: StringField): z.ZodTypeAny {
  if (field.equals !== undefined) return z.literal(field.equals);
  if (field.oneOf && field.oneOf.length > 0) {
    const [first, ...rest] = field.oneOf;
    return z.enum([first, ...rest]);
  }
  return field.nonEmpty ? z.string().min(1) : z.string();
}

function listSchema(field: ListField, items: z.ZodTypeAny): z.ZodTypeAny {
  let schema = z.array(items);
  if (field.minItems !== undefined) schema = schema.min(field.minItems);
  if (field.maxItems !== undefined) schema = schema.max(field.maxItems);
  return schema;
}

function shallowField(field: FieldSpec): z.ZodTypeAny {
  switch (field.type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "list":
      return z.array(z.unknown());
    case "mapping":
      return z.record(z.string(), z.unknown());
  }
}

function fullField(field: FieldSpec): z.ZodTypeAny {
  switch (field.type) {
    case "string":
      return stringSchema(field);
    case "number":
      return field.min !== undefined ? z.number().min(field.min) : z.number();
    case "boolean":
      return z.boolean();
    case "list":
      return listSchema(field, field.items ? fullField(field.items) : z.unknown());
    case "mapping":
      return field.fields ? objectOf(field.fields, fullField) : z.record(z.string(), z.unknown());
  }
}

function objectOf(fields: Record<string, FieldSpec>, build: (field: FieldSpec) => z.ZodTypeAny): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, field] of Object.entries(fields)) shape[name] = optionalIf(build(field), field);
  return z.object(shape).passthrough();
}

export function compileKindSpec(spec: KindSpec): CompiledKind {
  const countShape: Record<string, FieldSpec> = {};
  for (const [name, field] of Object.entries(spec.fields)) {
    if (field.type === "list") countShape[name] = { ...field, items: undefined };
  }

  return {
    kind: spec.kind,
    shallow: objectOf(spec.fields, shallowField),
    counts: objectOf(countShape, fullField),
    full: objectOf(spec.fields, fullField)
  };
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`;
    else out += out ? `.${part}` : part;
  }
  return out || "$";
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = root;
  for (const part of path) {
    if (Array.isArray(current) && typeof part === "number") current = current[part];
    else if (current && typeof current === "object" && !Array.isArray(current)) current = Reflect.get(current, part);
    else return undefined;
  }
  return current;
}

const TYPE_NAMES: Record<string, string> = {
  array: "list",
  object: "mapping",
  undefined: "missing"
};

export function describeType(value: unknown): string {
  if (value === undefined) return "missing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  if (typeof value === "object") return "mapping";
  return typeof value;
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return value.length === 0 ? "empty string" : JSON.stringify(value);
  if (Array.isArray(value)) return `${value.length} items`;
  return describeType(value);
}

function violationFrom(kind: string, payload: unknown, issue: z.ZodIssue): SchemaViolationError {
  const path = formatPath(issue.path);
  const actual = valueAt(payload, issue.path);

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return new SchemaViolationError(kind, path, TYPE_NAMES[issue.expected] ?? issue.expected, describeType(actual));
    case z.ZodIssueCode.too_small:
      if (issue.type === "array") {
        return new SchemaViolationError(kind, path, `at least ${issue.minimum} items`, describeValue(actual));
      }
      if (issue.type === "string") return new SchemaViolationError(kind, path, "non-empty string", describeValue(actual));
      return new SchemaViolationError(kind, path, `>= ${issue.minimum}`, String(actual));
    case z.ZodIssueCode.too_big:
      if (issue.type === "array") {
        return new SchemaViolationError(kind, path, `at most ${issue.maximum} items`, describeValue(actual));
      }
      return new SchemaViolationError(kind, path, `<= ${issue.maximum}`, String(actual));
    case z.ZodIssueCode.invalid_enum_value:
      return new SchemaViolationError(kind, path, `one of ${issue.options.join(", ")}`, describeValue(actual));
    case z.ZodIssueCode.invalid_literal:
      return new SchemaViolationError(kind, path, JSON.stringify(issue.expected), describeValue(actual));
    default:
      return new SchemaViolationError(kind, path, issue.message, describeValue(actual));
  }
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Checks a payload against its kind in three passes (top-level types, list
 * counts, nested shapes) and reports the first violation. Accepted payloads
 * are frozen and returned unchanged, extra fields included.
 */
export function validateOutput(payload: JsonValue, spec: KindSpec | CompiledKind): ValidatedOutput {
  const compiled = "full" in spec ? spec : compileKindSpec(spec);

  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    throw new SchemaViolationError(compiled.kind, "$", "mapping", describeType(payload));
  }

  for (const phase of [compiled.shallow, compiled.counts, compiled.full]) {
    const result = phase.safeParse(payload);
    if (!result.success) {
      const issue = result.error.issues[0];
      if (issue) throw violationFrom(compiled.kind, payload, issue);
      throw new SchemaViolationError(compiled.kind, "$", compiled.kind, "invalid payload");
    }
  }

  return { kind: compiled.kind, value: deepFreeze(payload) };
}
