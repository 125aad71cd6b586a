import { ParameterCondition } from "./conditions";
import { ConfigurationError } from "./errors";
import type { InputTemplate } from "./input_template";
import { OutputTemplate } from "./output_template";
import type { FileRegistry, GeneratedOutput, GenerateOptions, InputFile, SubmittedParameters } from "./types";

export type OutputEntry = OutputTemplate | ParameterCondition<OutputTemplate>;

export interface ProfileOptions {
  id: string;
  label?: string;
  input?: InputTemplate[];
  output: OutputEntry[];
}

/**
 * A bundle of input templates and the output templates produced from them.
 *
 * Construction validates the whole structure: every branch of every output
 * condition must lead to an OutputTemplate and every OutputTemplate must have
 * a parent among this profile's inputs (or be unique with a literal filename).
 * Parents found automatically are kept here, not on the shared templates.
 */
export class Profile {
  readonly id: string;
  readonly label?: string;
  readonly inputTemplates: readonly InputTemplate[];
  readonly output: readonly OutputEntry[];
  private resolvedParents = new Map<OutputTemplate, string | undefined>();

  constructor(options: ProfileOptions) {
    this.id = options.id;
    this.label = options.label;
    this.inputTemplates = [...(options.input ?? [])];
    this.output = [...options.output];

    const inputIds = new Set<string>();
    for (const template of this.inputTemplates) {
      if (inputIds.has(template.id)) {
        throw new ConfigurationError(`Duplicate input template '${template.id}' in profile '${this.id}'`);
      }
      inputIds.add(template.id);
    }

    for (const template of this.outputTemplates()) {
      if (!(template instanceof OutputTemplate)) {
        throw new ConfigurationError(`Profile '${this.id}' has an output branch that is not an OutputTemplate`);
      }
      if (template.parent !== undefined) {
        if (!inputIds.has(template.parent)) {
          throw new ConfigurationError(
            `Output template '${template.id}' names parent '${template.parent}', which is not an input of profile '${this.id}'`
          );
        }
        this.resolvedParents.set(template, template.parent);
        continue;
      }
      const parent = template.findParent(this.inputTemplates);
      if (parent === undefined && !(template.unique && template.filename !== undefined)) {
        throw new ConfigurationError(
          `No parent input template found for output template '${template.id}' in profile '${this.id}'`
        );
      }
      this.resolvedParents.set(template, parent);
    }
  }

  /** Every OutputTemplate reachable from the output list, conditions expanded */
  outputTemplates(): OutputTemplate[] {
    return this.output.flatMap((entry) =>
      entry instanceof ParameterCondition ? entry.allPossibilities() : [entry]
    );
  }

  getInputTemplate(id: string): InputTemplate | undefined {
    return this.inputTemplates.find((template) => template.id === id);
  }

  parentIdFor(template: OutputTemplate): string | undefined {
    if (this.resolvedParents.has(template)) return this.resolvedParents.get(template);
    return template.parent ?? template.findParent(this.inputTemplates);
  }

  match(registry: FileRegistry, parameters: SubmittedParameters): boolean {
    for (const template of this.inputTemplates) {
      if (!template.matchingFiles(registry).length) return false;
    }
    if (!this.output.length) return false;
    return this.output.every((entry) => !(entry instanceof ParameterCondition) || entry.match(parameters));
  }

  matchingFiles(registry: FileRegistry): InputFile[] {
    return this.inputTemplates.flatMap((template) => template.matchingFiles(registry));
  }

  /** Yields nothing when the profile does not match */
  *generate(
    registry: FileRegistry,
    parameters: SubmittedParameters,
    options: GenerateOptions = {}
  ): Generator<GeneratedOutput> {
    if (!this.match(registry, parameters)) return;
    for (const entry of this.output) {
      const template = entry instanceof ParameterCondition ? entry.evaluate(parameters) : entry;
      if (!template) continue;
      yield* template.generate(this, parameters, registry, options);
    }
  }

  toJSON() {
    return {
      id: this.id,
      ...(this.label ? { label: this.label } : {}),
      input: this.inputTemplates.map((template) => template.toJSON()),
      output: this.output.map((entry) => entry.toJSON()),
    };
  }
}
