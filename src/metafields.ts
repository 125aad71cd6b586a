import { AmbiguousCopySource, ConfigurationError } from "./errors";
import type { MetadataRecord } from "./metadata";
import type { CopyPolicy, InputFile, ScalarValue, SubmittedParameters } from "./types";

/** A relevant input file together with its registered metadata */
export interface ResolvedInputFile extends InputFile {
  metadata?: MetadataRecord;
}

export interface MetaFieldContext {
  parameters: SubmittedParameters;
  parentFile?: ResolvedInputFile;
  relevantInputFiles: ResolvedInputFile[];
  copyPolicy: CopyPolicy;
}

/** Working attribute map of an output record before it is validated */
export type MetadataDraft = Map<string, ScalarValue>;

export type MetaFieldOperator = "set" | "unset" | "copy" | "parameter";

export interface MetaField {
  readonly key: string;
  readonly operator: MetaFieldOperator;
  /** Apply the rule; returns whether the draft changed */
  resolve(draft: MetadataDraft, context: MetaFieldContext): boolean;
  toJSON(): { operator: MetaFieldOperator; key: string; value?: ScalarValue | string };
}

export class SetMetaField implements MetaField {
  readonly operator = "set";

  constructor(readonly key: string, readonly value: ScalarValue) {}

  resolve(draft: MetadataDraft): boolean {
    draft.set(this.key, this.value);
    return true;
  }

  toJSON(): ReturnType<MetaField["toJSON"]> {
    return { operator: this.operator, key: this.key, value: this.value };
  }
}

export class UnsetMetaField implements MetaField {
  readonly operator = "unset";

  constructor(readonly key: string, readonly value?: ScalarValue) {}

  resolve(draft: MetadataDraft): boolean {
    if (!draft.has(this.key)) return false;
    if (this.value !== undefined && draft.get(this.key) !== this.value) return false;
    draft.delete(this.key);
    return true;
  }

  toJSON(): ReturnType<MetaField["toJSON"]> {
    return {
      operator: this.operator,
      key: this.key,
      ...(this.value !== undefined ? { value: this.value } : {}),
    };
  }
}

/**
 * Copies a value from the metadata of a relevant input file.
 *
 * The source is `templateId` (same key) or `templateId.key`.
 */
export class CopyMetaField implements MetaField {
  readonly operator = "copy";
  readonly templateId: string;
  readonly sourceKey: string;

  constructor(readonly key: string, readonly source: string) {
    const [templateId, ...rest] = source.split(".");
    if (!templateId || rest.length > 1 || rest[0] === "") {
      throw new ConfigurationError(
        `Invalid copy source '${source}' for '${key}' (expected 'template' or 'template.key')`
      );
    }
    this.templateId = templateId;
    this.sourceKey = rest[0] ?? key;
  }

  resolve(draft: MetadataDraft, context: MetaFieldContext): boolean {
    const candidates = context.relevantInputFiles.filter(
      (file) => file.templateId === this.templateId && file.metadata?.has(this.sourceKey)
    );
    if (!candidates.length) return false;
    if (candidates.length > 1 && context.copyPolicy === "error") {
      throw new AmbiguousCopySource(
        `Copy of '${this.key}' from '${this.source}' matches ${candidates.length} files: ${candidates.map((c) => c.filename).join(", ")}`
      );
    }
    const chosen = context.copyPolicy === "first" ? candidates[0] : candidates[candidates.length - 1];
    const value = chosen?.metadata?.get(this.sourceKey);
    if (value === undefined) return false;
    draft.set(this.key, value);
    return true;
  }

  toJSON(): ReturnType<MetaField["toJSON"]> {
    return { operator: this.operator, key: this.key, value: this.source };
  }
}

export class ParameterMetaField implements MetaField {
  readonly operator = "parameter";

  constructor(readonly key: string, readonly parameter: string) {}

  resolve(draft: MetadataDraft, context: MetaFieldContext): boolean {
    const value = context.parameters[this.parameter];
    if (value === undefined) return false;
    // metadata holds scalars; a multi-choice selection is stored comma separated
    draft.set(this.key, Array.isArray(value) ? value.join(",") : value);
    return true;
  }

  toJSON(): ReturnType<MetaField["toJSON"]> {
    return { operator: this.operator, key: this.key, value: this.parameter };
  }
}

export function isMetaField(value: unknown): value is MetaField {
  return (
    value instanceof SetMetaField ||
    value instanceof UnsetMetaField ||
    value instanceof CopyMetaField ||
    value instanceof ParameterMetaField
  );
}

