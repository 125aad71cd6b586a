/**
 * Format Profiles Service Schema
 * ==============================
 *
 * A service definition declares which files a wrapped tool accepts, which
 * files it produces, and how the metadata of every produced file is derived
 * from the uploaded files and the submitted parameters.
 *
 * STRUCTURE:
 * ----------
 * spec           - Fixed string "formatprofiles"
 * spec_version   - Semver string; the loader refuses another major version
 * data           - Formats, profiles and settings
 * metadata       - Extensibility layer
 *
 * This file is the SOURCE OF TRUTH for the YAML layout. The loader in
 * src/config.ts narrows parsed documents into these shapes.
 *
 * PROFILES:
 * ---------
 * A profile pairs input templates with output templates. It matches when
 * every input template has at least one registered file and every
 * parameter condition listed directly under `output` holds. A matching
 * profile yields one output file per parent input file (multi templates)
 * or exactly one (unique templates).
 *
 * INPUT CONSTRAINTS:
 * ------------------
 *   { key, value }                      attribute equals the value
 *   { key, value: [a, b] }              attribute is one of the values
 *   { key, value, operator: notequals } attribute differs, or is absent
 *   { key, value, operator: lessthan }  ordering operators compare numbers or strings
 *
 * OUTPUT METAFIELDS:
 * ------------------
 *   set:        { key, value }        write a literal value
 *   unset:      { key, value? }       remove a key (only if equal to value)
 *   copy:       { key, from }         from "<inputtemplate>" or "<inputtemplate>.<key>"
 *   parameter:  { key, parameter }    take a submitted parameter
 *   condition:  { ... }               choose one of the above by parameters
 *
 * ATTRIBUTES:
 * -----------
 *   encoding: required          must be present, any value
 *   language: optional          may be absent, any value
 *   mode: [fast, slow]          one of the listed values, must be present
 *   mode: [fast, slow, null]    one of the listed values, may be absent
 *   tokenized: { fixed: true }  always forced to the value
 *
 * EXAMPLE CONFIGURATION:
 * ----------------------
 *
 *   spec: formatprofiles
 *   spec_version: "0.1.0"
 *
 *   data:
 *     service_id: tokenizer
 *     settings:
 *       copy_policy: last
 *
 *     formats:
 *       FoliaXMLFormat:
 *         mimetype: text/xml
 *         schema: https://example.org/folia.xsd
 *         attributes:
 *           version: optional
 *
 *     profiles:
 *       - id: tokenize
 *         input:
 *           - id: textinput
 *             format: PlainTextFormat
 *             label: Text input
 *             unique: false
 *             extension: txt
 *             parameters:
 *               - id: encoding
 *                 type: choice
 *                 choices: [utf-8, iso-8859-1]
 *                 required: true
 *         output:
 *           - id: tokenized
 *             format: TokenizedTextFormat
 *             label: Tokenized text
 *             unique: false
 *             extension: tok
 *             remove_extensions: [txt]
 *             copy_metadata: true
 *             metafields:
 *               - parameter: { key: language, parameter: lang }
 *           - condition:
 *               conditions:
 *                 - { key: stats, value: true, operator: equals }
 *               then:
 *                 id: statistics
 *                 format: CSVFormat
 *                 label: Statistics
 *                 filename: stats.csv
 *                 metafields:
 *                   - set: { key: encoding, value: utf-8 }
 */

export type ScalarConfig = string | number | boolean;

export interface ServiceWrapper {
  spec: "formatprofiles";
  spec_version: string;
  data: ServiceData;
  metadata?: Record<string, unknown>;
}

export interface ServiceData {
  /** Identifier recorded in the provenance of generated records */
  service_id?: string;

  settings?: SettingsConfig;

  /** Formats keyed by id; these extend (and may replace) the built-in formats */
  formats?: Record<string, FormatConfig>;

  profiles: ProfileConfig[];
}

export interface SettingsConfig {
  /**
   * Which relevant input file a `copy` metafield reads when several match.
   * Defaults to "last".
   */
  copy_policy?: "first" | "last" | "error";
}

export interface FormatConfig {
  label?: string;
  mimetype?: string;
  schema?: string;

  /** null or absent: any attribute, any value */
  attributes?: Record<string, AttributeConfig> | null;

  /** Whether keys outside `attributes` may be set */
  allow_custom_attributes?: boolean;
}

export type AttributeConfig =
  | "required"
  | "optional"
  | { fixed: ScalarConfig }
  | Array<ScalarConfig | null>;

export interface ProfileConfig {
  id: string;
  label?: string;
  input?: InputTemplateConfig[];
  output: OutputEntryConfig[];
}

export interface InputTemplateConfig {
  /** Must not contain path separators */
  id: string;
  format: string;
  label: string;

  /** Defaults to true; false means a sequence-numbered collection */
  unique?: boolean;

  /** Name uploads are stored under; `#` is replaced by the sequence number */
  filename?: string;
  extension?: string;
  accept_archive?: boolean;
  parameters?: ParameterConfig[];

  /** Requirements on the metadata of files that fit this template */
  constraints?: ConstraintConfig[];
}

export interface ConstraintConfig {
  key: string;

  /** A list means membership: any of the values, or none of them for notequals */
  value: ScalarConfig | ScalarConfig[];

  /** Defaults to "equals"; a list takes only equals or notequals */
  operator?: ConditionOperator;
}

export type ParameterType = "string" | "text" | "integer" | "float" | "boolean" | "choice";

export interface ParameterConfig {
  id: string;
  type: ParameterType;
  name?: string;
  description?: string;
  required?: boolean;
  default?: ScalarConfig | ScalarConfig[];

  /** choice only: allowed values, or value -> label */
  choices?: string[] | Record<string, string>;

  /** choice only: accept several values */
  multi?: boolean;

  /** integer and float only */
  min?: number;
  max?: number;

  /** string and text only */
  maxlength?: number;

  /** Parameter ids that may not be set together with this one */
  forbid?: string[];

  /** Parameter ids that must be set together with this one */
  require?: string[];

  allow_users?: string[];
  deny_users?: string[];
}

export interface OutputTemplateConfig {
  id: string;
  format: string;
  label: string;
  unique?: boolean;
  filename?: string;
  extension?: string;
  remove_extensions?: "all" | "none" | string[];

  /** Input template id; resolved automatically when omitted */
  parent?: string;
  copy_metadata?: boolean;
  metafields?: MetaFieldEntryConfig[];
}

export interface ConditionEntryConfig<T> {
  condition: ConditionConfig<T>;
}

export type OutputEntryConfig = OutputTemplateConfig | ConditionEntryConfig<OutputEntryConfig>;

export type ConditionOperator =
  | "equals"
  | "notequals"
  | "contains"
  | "greaterthan"
  | "greaterequalthan"
  | "lessthan"
  | "lessequalthan";

export interface ConditionClauseConfig {
  key: string;
  value: ScalarConfig;

  /** Defaults to "equals" */
  operator?: ConditionOperator;
}

export interface ConditionConfig<T> {
  conditions: ConditionClauseConfig[];
  disjunction?: boolean;
  then: T;
  otherwise?: T;
}

export type MetaFieldConfig =
  | { set: { key: string; value: ScalarConfig } }
  | { unset: { key: string; value?: ScalarConfig } }
  | { copy: { key: string; from: string } }
  | { parameter: { key: string; parameter: string } };

export type MetaFieldEntryConfig = MetaFieldConfig | ConditionEntryConfig<MetaFieldEntryConfig>;

export type FormatprofilesConfig = ServiceWrapper;
