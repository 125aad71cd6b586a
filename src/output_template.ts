import { ParameterCondition } from "./conditions";
import {
  ConfigurationError,
  DanglingParent,
  NoMatchingInput,
  UnresolvableOutputTemplate,
} from "./errors";
import { MetadataRecord } from "./metadata";
import type { FormatClass } from "./metadata";
import type { MetaField, MetaFieldContext, MetadataDraft, ResolvedInputFile } from "./metafields";
import { SEQUENCE_PLACEHOLDER } from "./input_template";
import type { InputTemplate } from "./input_template";
import type { Profile } from "./profile";
import type {
  FileRegistry,
  GeneratedOutput,
  GenerateOptions,
  Provenance,
  SubmittedParameters,
} from "./types";

export type RemoveExtensions = "none" | "all" | string[];

/** A metafield, or a condition choosing one by the submitted parameters */
export type MetaFieldRule = MetaField | ParameterCondition<MetaField>;

export interface OutputTemplateOptions {
  id: string;
  format: FormatClass;
  label: string;
  /** Defaults to true */
  unique?: boolean;
  filename?: string;
  extension?: string;
  removeExtensions?: RemoveExtensions;
  /** Input template id; resolved from the owning profile when omitted */
  parent?: string;
  copyMetadata?: boolean;
  metafields?: MetaFieldRule[];
}

/**
 * A class of output file a profile produces, and the rules that derive its
 * name and metadata from the input files and parameters.
 */
export class OutputTemplate {
  readonly id: string;
  readonly format: FormatClass;
  readonly label: string;
  readonly unique: boolean;
  readonly filename?: string;
  readonly extension?: string;
  readonly removeExtensions: RemoveExtensions;
  readonly parent?: string;
  readonly copyMetadata: boolean;
  readonly metafields: readonly MetaFieldRule[];

  constructor(options: OutputTemplateOptions) {
    if (!options.id || /[\/\\]/.test(options.id)) {
      throw new ConfigurationError(`Invalid output template id '${options.id}'`);
    }
    this.id = options.id;
    this.format = options.format;
    this.label = options.label;
    this.unique = options.unique ?? true;
    this.filename = options.filename;
    this.extension = options.extension?.replace(/^\./, "");
    const remove = options.removeExtensions ?? "none";
    this.removeExtensions = Array.isArray(remove) ? remove.map((ext) => ext.replace(/^\./, "")) : remove;
    this.parent = options.parent;
    this.copyMetadata = options.copyMetadata ?? false;
    this.metafields = [...(options.metafields ?? [])];

    if (!this.unique && this.filename !== undefined && !this.filename.includes(SEQUENCE_PLACEHOLDER)) {
      throw new ConfigurationError(
        `Output template '${this.id}' is not unique, so its filename must contain '${SEQUENCE_PLACEHOLDER}'`
      );
    }
  }

  /**
   * Positional heuristic: the first input template with the same uniqueness.
   */
  findParent(inputTemplates: readonly InputTemplate[]): string | undefined {
    return inputTemplates.find((template) => template.unique === this.unique)?.id;
  }

  getParent(profile: Profile): InputTemplate {
    const parentId = this.parent ?? profile.parentIdFor(this);
    if (parentId === undefined) {
      throw new UnresolvableOutputTemplate(`Output template '${this.id}' has no parent in profile '${profile.id}'`);
    }
    const parent = profile.getInputTemplate(parentId);
    if (!parent) {
      throw new DanglingParent(
        `Parent '${parentId}' of output template '${this.id}' is not an input template of profile '${profile.id}'`
      );
    }
    return parent;
  }

  /**
   * Lazily produce the filename and metadata of every output file.
   * One output per parent input file, or a single one for parentless
   * templates (unique, with a literal filename).
   */
  *generate(
    profile: Profile,
    parameters: SubmittedParameters,
    registry: FileRegistry,
    options: GenerateOptions = {}
  ): Generator<GeneratedOutput> {
    const parentId = this.parent ?? profile.parentIdFor(this);

    if (parentId === undefined) {
      if (!this.unique || this.filename === undefined) {
        throw new UnresolvableOutputTemplate(
          `Output template '${this.id}' has no parent and is not a unique template with a filename`
        );
      }
      yield this.build(profile, parameters, options, this.outputFilename(this.filename, 0), undefined, []);
      return;
    }

    const parent = this.getParent(profile);
    const parentFiles = parent.matchingFiles(registry);
    if (!parentFiles.length) {
      throw new NoMatchingInput(`No input files match '${parent.id}', parent of output template '${this.id}'`);
    }

    const inputFiles = collectInputFiles(profile, registry);

    for (const { sequence, filename } of parentFiles) {
      const relevant = inputFiles.filter((file) => file.sequence === 0 || file.sequence === sequence);
      const parentFile = relevant.find((file) => file.templateId === parent.id && file.filename === filename);
      yield this.build(
        profile,
        parameters,
        options,
        this.outputFilename(this.filename ?? filename, sequence),
        parentFile,
        relevant
      );
    }
  }

  private outputFilename(base: string, sequence: number): string {
    let filename = this.unique ? base : base.split(SEQUENCE_PLACEHOLDER).join(String(sequence));

    if (this.removeExtensions === "all") {
      filename = filename.replace(/\.[^./\\]+$/, "");
    } else if (Array.isArray(this.removeExtensions)) {
      const lowered = filename.toLowerCase();
      const match = this.removeExtensions.find((ext) => lowered.endsWith(`.${ext.toLowerCase()}`));
      if (match !== undefined) filename = filename.slice(0, -(match.length + 1));
    }

    // A literal filename is already complete
    if (this.extension && this.filename === undefined) {
      filename += `.${this.extension}`;
    }
    return filename;
  }

  private build(
    profile: Profile,
    parameters: SubmittedParameters,
    options: GenerateOptions,
    filename: string,
    parentFile: ResolvedInputFile | undefined,
    relevantInputFiles: ResolvedInputFile[]
  ): GeneratedOutput {
    const draft: MetadataDraft = new Map();
    if (this.copyMetadata && parentFile?.metadata) {
      for (const [key, value] of parentFile.metadata.entries()) draft.set(key, value);
    }

    const context: MetaFieldContext = {
      parameters,
      parentFile,
      relevantInputFiles,
      copyPolicy: options.copyPolicy ?? "last",
    };
    for (const rule of this.metafields) {
      const field = rule instanceof ParameterCondition ? rule.evaluate(parameters) : rule;
      if (field) field.resolve(draft, context);
    }

    const provenance: Provenance = {
      ...(options.serviceId ? { serviceId: options.serviceId } : {}),
      profileId: profile.id,
      outputTemplateId: this.id,
      inputFiles: relevantInputFiles.map(({ templateId, sequence, filename }) => ({ templateId, sequence, filename })),
      parameters: copyParameters(parameters),
    };
    return {
      filename,
      metadata: new MetadataRecord(this.format, draft, { provenance }),
      outputTemplateId: this.id,
      ...(parentFile ? { parentFile: parentFile.filename } : {}),
    };
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
      ...(this.removeExtensions !== "none" ? { removeextensions: this.removeExtensions } : {}),
      ...(this.parent ? { parent: this.parent } : {}),
      ...(this.copyMetadata ? { copymetadata: true } : {}),
      metafields: this.metafields.map((rule) => rule.toJSON()),
    };
  }
}

function collectInputFiles(profile: Profile, registry: FileRegistry): ResolvedInputFile[] {
  return profile.inputTemplates.flatMap((template) =>
    template.matchingFiles(registry).map((file) => ({
      ...file,
      metadata: registry.getMetadata(file.filename),
    }))
  );
}

/** Multi-choice lists are copied so later changes by the caller do not reach the provenance */
function copyParameters(parameters: SubmittedParameters): SubmittedParameters {
  const copy: SubmittedParameters = {};
  for (const [key, value] of Object.entries(parameters)) {
    copy[key] = Array.isArray(value) ? [...value] : value;
  }
  return copy;
}
