import { basename } from "path";
import { matchConstraints } from "./constraints";
import type { MetadataConstraint } from "./constraints";
import { ConfigurationError, ValidationError } from "./errors";
import { MetadataRecord } from "./metadata";
import type { FormatClass } from "./metadata";
import type { Parameter } from "./parameters";
import type { FileRegistry, InputFile, ScalarValue } from "./types";

export interface InputTemplateOptions {
  id: string;
  format: FormatClass;
  label: string;
  /** Defaults to true */
  unique?: boolean;
  filename?: string;
  extension?: string;
  acceptArchive?: boolean;
  parameters?: Parameter[];
  /** Requirements on the metadata of files that fit this template */
  constraints?: MetadataConstraint[];
}

export interface ValidationResult {
  hasErrors: boolean;
  /** Private copies holding the submitted values and any errors */
  parameters: Parameter[];
}

export type InputGenerationResult =
  | { hasErrors: true; parameters: Parameter[] }
  | { hasErrors: false; parameters: Parameter[]; metadata: MetadataRecord };

/** Throw the problems of a failed validation instead of returning them */
export function assertValid(result: ValidationResult): void {
  if (!result.hasErrors) return;
  const problems = result.parameters.flatMap((parameter) =>
    parameter.error ? [{ parameter: parameter.id, message: parameter.error }] : []
  );
  throw new ValidationError(problems);
}

/** Placeholder replaced by the sequence number in multi templates */
export const SEQUENCE_PLACEHOLDER = "#";

/**
 * A class of input file a profile accepts.
 *
 * Templates are shared configuration: validate() and generate() never touch
 * the template's own parameters.
 */
export class InputTemplate {
  readonly id: string;
  readonly format: FormatClass;
  readonly label: string;
  readonly unique: boolean;
  readonly filename?: string;
  readonly extension?: string;
  readonly acceptArchive: boolean;
  readonly parameters: readonly Parameter[];
  readonly constraints: readonly MetadataConstraint[];

  constructor(options: InputTemplateOptions) {
    if (!options.id || /[\/\\]/.test(options.id)) {
      throw new ConfigurationError(`Invalid input template id '${options.id}'`);
    }
    this.id = options.id;
    this.format = options.format;
    this.label = options.label;
    this.unique = options.unique ?? true;
    this.filename = options.filename;
    this.extension = options.extension?.replace(/^\./, "");
    this.acceptArchive = options.acceptArchive ?? false;
    this.parameters = [...(options.parameters ?? [])];
    this.constraints = [...(options.constraints ?? [])];

    if (!this.unique && this.filename !== undefined && !this.filename.includes(SEQUENCE_PLACEHOLDER)) {
      throw new ConfigurationError(
        `Input template '${this.id}' is not unique, so its filename must contain '${SEQUENCE_PLACEHOLDER}'`
      );
    }
    const seen = new Set<string>();
    for (const parameter of this.parameters) {
      if (seen.has(parameter.id)) {
        throw new ConfigurationError(`Duplicate parameter '${parameter.id}' in input template '${this.id}'`);
      }
      seen.add(parameter.id);
    }
  }

  /**
   * Files registered under this template, ascending by sequence number.
   * A unique template with anything but exactly one file does not match.
   */
  matchingFiles(registry: FileRegistry): InputFile[] {
    const files = [...registry.lookupFilesForTemplate(this.id)].sort((a, b) => a.sequence - b.sequence);
    if (this.unique && files.length !== 1) return [];
    return files;
  }

  /** Whether existing metadata fits this template: same format, every constraint met */
  match(record: MetadataRecord): boolean {
    return matchConstraints(this.format, this.constraints, record);
  }

  getParameter(id: string): Parameter | undefined {
    return this.parameters.find((p) => p.id === id);
  }

  validate(submission: Record<string, unknown>, user?: string): ValidationResult {
    const parameters = this.parameters.map((p) => p.clone());
    let hasErrors = false;

    for (const parameter of parameters) {
      const raw = submission[parameter.id];
      const submitted = raw !== undefined && raw !== null && raw !== "";
      // Parameters outside the user's access are neither settable nor required of them
      if (!parameter.access(user)) {
        if (submitted) {
          parameter.error = "You are not allowed to set this parameter";
          hasErrors = true;
        }
        continue;
      }
      if (submitted) {
        if (!parameter.set(raw)) hasErrors = true;
      } else if (parameter.required && !parameter.hasValue()) {
        parameter.error = "This parameter is required";
        hasErrors = true;
      }
    }

    const byId = new Map(parameters.map((p) => [p.id, p]));
    for (const parameter of parameters) {
      if (!parameter.hasValue()) continue;
      for (const other of parameter.forbid) {
        const conflicting = byId.get(other);
        if (conflicting?.hasValue()) {
          parameter.error = `Can not be set together with '${other}'`;
          if (!conflicting.error) conflicting.error = `Can not be set together with '${parameter.id}'`;
          hasErrors = true;
        }
      }
      for (const other of parameter.require) {
        if (!byId.get(other)?.hasValue()) {
          parameter.error = `Requires '${other}' to be set as well`;
          hasErrors = true;
        }
      }
    }

    return { hasErrors, parameters };
  }

  /**
   * Build the metadata of an uploaded file from the submitted parameters.
   * Pass a prior validation result to skip validating twice.
   */
  generate(
    submission: Record<string, unknown>,
    user?: string,
    validation?: ValidationResult
  ): InputGenerationResult {
    const { hasErrors, parameters } = validation ?? this.validate(submission, user);
    if (hasErrors) return { hasErrors: true, parameters };

    const attributes = new Map<string, ScalarValue>();
    for (const { id, value } of parameters) {
      if (value === undefined) continue;
      attributes.set(id, Array.isArray(value) ? value.join(",") : value);
    }
    const metadata = new MetadataRecord(this.format, attributes, { inputTemplateId: this.id });
    return { hasErrors: false, parameters, metadata };
  }

  /** Name an upload is stored under */
  filenameFor(uploadedName: string, sequence: number): string {
    let filename = basename(uploadedName);
    if (this.filename !== undefined) {
      filename = this.unique
        ? this.filename
        : this.filename.split(SEQUENCE_PLACEHOLDER).join(String(sequence));
    }
    if (this.extension && !filename.toLowerCase().endsWith(`.${this.extension.toLowerCase()}`)) {
      filename += `.${this.extension}`;
    }
    return filename;
  }

  toJSON() {
    return {
      id: this.id,
      label: this.label,
      format: this.format.id,
      ...(this.format.mimetype ? { mimetype: this.format.mimetype } : {}),
      ...(this.format.schema ? { schema: this.format.schema } : {}),
      unique: this.unique,
      ...(this.filename ? { filename: this.filename } : {}),
      ...(this.extension ? { extension: this.extension } : {}),
      ...(this.acceptArchive ? { acceptarchive: true } : {}),
      parameters: this.parameters.map((p) => p.toJSON()),
      ...(this.constraints.length ? { constraints: this.constraints.map((c) => c.toJSON()) } : {}),
    };
  }
}
