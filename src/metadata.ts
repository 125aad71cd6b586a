import { IncompleteMetadata, InvalidValue, SchemaViolation } from "./errors";
import type { Provenance, ScalarValue } from "./types";

export type AttributeRule =
  | { kind: "required" }
  | { kind: "optional" }
  | { kind: "enumerated"; values: ScalarValue[]; allowAbsent: boolean }
  | { kind: "fixed"; value: ScalarValue };

/** null means any attribute with any value */
export type AttributeSchema = Record<string, AttributeRule> | null;

export interface FormatClass {
  id: string;
  label?: string;
  mimetype?: string;
  schema?: string;
  attributes: AttributeSchema;
  allowCustomAttributes: boolean;
}

export interface MetadataOptions {
  inputTemplateId?: string;
  provenance?: Provenance;
}

export function isScalar(value: unknown): value is ScalarValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function isPresenceRequired(rule: AttributeRule): boolean {
  if (rule.kind === "required") return true;
  if (rule.kind === "enumerated") return !rule.allowAbsent;
  return false;
}

/**
 * Check a single attribute write against a format's schema.
 * Returns the value that should be stored (fixed attributes win).
 */
export function validateAttribute(format: FormatClass, key: string, value: unknown): ScalarValue {
  if (!isScalar(value)) {
    throw new SchemaViolation(
      `Attribute '${key}' of ${format.id} must be a string, number or boolean`
    );
  }
  const schema = format.attributes;
  if (schema === null) return value;

  const rule = schema[key];
  if (!rule) {
    if (format.allowCustomAttributes) return value;
    throw new SchemaViolation(`Attribute '${key}' is not defined for format ${format.id}`);
  }
  switch (rule.kind) {
    case "enumerated":
      if (!rule.values.includes(value)) {
        throw new InvalidValue(
          `Value '${value}' is not allowed for attribute '${key}' of ${format.id} (expected one of: ${rule.values.join(", ")})`
        );
      }
      return value;
    case "fixed":
      return rule.value;
    default:
      return value;
  }
}

/**
 * Validated key/value metadata describing one file.
 *
 * @example
 * ```typescript
 * const record = new MetadataRecord(PlainTextFormat, { encoding: "utf-8" });
 * record.set("language", "en");
 * record.toJSON();
 * // { format: 'PlainTextFormat', mimetype: 'text/plain', attributes: { encoding: 'utf-8', language: 'en' } }
 * ```
 */
export class MetadataRecord {
  readonly format: FormatClass;
  readonly inputTemplateId?: string;
  readonly provenance?: Provenance;
  private data = new Map<string, ScalarValue>();

  constructor(
    format: FormatClass,
    attributes: Map<string, unknown> | Record<string, unknown> = {},
    options: MetadataOptions = {}
  ) {
    this.format = format;
    this.inputTemplateId = options.inputTemplateId;
    this.provenance = options.provenance;

    const entries = attributes instanceof Map ? [...attributes.entries()] : Object.entries(attributes);
    for (const [key, value] of entries) {
      if (value === undefined || value === null) continue;
      this.set(key, value);
    }

    const schema = format.attributes;
    if (schema === null) return;
    for (const [key, rule] of Object.entries(schema)) {
      if (rule.kind === "fixed") {
        this.data.set(key, rule.value);
      } else if (isPresenceRequired(rule) && !this.data.has(key)) {
        throw new IncompleteMetadata(`Required attribute '${key}' of ${format.id} not specified`);
      }
    }
  }

  get mimetype(): string | undefined {
    return this.format.mimetype;
  }

  get schema(): string | undefined {
    return this.format.schema;
  }

  get(key: string): ScalarValue | undefined {
    return this.data.get(key);
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  set(key: string, value: unknown): void {
    this.data.set(key, validateAttribute(this.format, key, value));
  }

  keys(): string[] {
    return [...this.data.keys()];
  }

  entries(): [string, ScalarValue][] {
    return [...this.data.entries()];
  }

  toJSON(): {
    format: string;
    mimetype?: string;
    schema?: string;
    inputtemplate?: string;
    attributes: Record<string, ScalarValue>;
    provenance?: Provenance;
  } {
    return {
      format: this.format.id,
      ...(this.mimetype ? { mimetype: this.mimetype } : {}),
      ...(this.schema ? { schema: this.schema } : {}),
      ...(this.inputTemplateId ? { inputtemplate: this.inputTemplateId } : {}),
      attributes: Object.fromEntries(this.data),
      ...(this.provenance ? { provenance: this.provenance } : {}),
    };
  }
}
