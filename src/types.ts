import type { MetadataRecord } from "./metadata";

export type {
  AttributeConfig,
  ConditionClauseConfig,
  ConditionConfig,
  ConditionEntryConfig,
  ConditionOperator,
  ConstraintConfig,
  FormatConfig,
  FormatprofilesConfig,
  InputTemplateConfig,
  MetaFieldConfig,
  MetaFieldEntryConfig,
  OutputEntryConfig,
  OutputTemplateConfig,
  ParameterConfig,
  ParameterType,
  ProfileConfig,
  ScalarConfig,
  ServiceData,
  ServiceWrapper,
  SettingsConfig,
} from "../formatprofiles";

/** Metadata values are scalars only */
export type ScalarValue = string | number | boolean;

/** Multi-choice parameters hold a list */
export type ParameterValue = ScalarValue | ScalarValue[];

/** Flat map of submitted parameter values, keyed by parameter id */
export type SubmittedParameters = Record<string, ParameterValue | undefined>;

export type CopyPolicy = "first" | "last" | "error";

/** A registered input file as reported by a FileRegistry */
export interface InputFile {
  templateId: string;
  /** 0 means the file applies to every sequence number */
  sequence: number;
  filename: string;
}

/**
 * The file/template association collaborator. Implementations answer from
 * whatever bookkeeping registered the uploads; the engine only reads.
 */
export interface FileRegistry {
  lookupFilesForTemplate(templateId: string): InputFile[];
  getMetadata(filename: string): MetadataRecord | undefined;
}

export interface Provenance {
  serviceId?: string;
  profileId?: string;
  outputTemplateId: string;
  inputFiles: InputFile[];
  parameters: SubmittedParameters;
}

export interface GenerateOptions {
  copyPolicy?: CopyPolicy;
  serviceId?: string;
}

export interface GeneratedOutput {
  filename: string;
  metadata: MetadataRecord;
  outputTemplateId: string;
  /** Input file the output was derived from; absent for parentless outputs */
  parentFile?: string;
}
