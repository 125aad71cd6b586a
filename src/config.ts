/**
 * Service definition loading.
 *
 * A service definition is a YAML document (see formatprofiles.d.ts) declaring
 * formats, profiles and settings. Everything is checked while loading, so a
 * misconfigured profile fails at startup rather than on the first request.
 *
 * @example
 * ```typescript
 * const service = loadServiceConfig("config/service.yml");
 * service.profiles.map((p) => p.id);
 * // [ 'tokenize', 'statistics' ]
 * ```
 */

import * as yaml from "yaml";
import { readFileSync, existsSync } from "fs";
import { CONDITION_OPERATORS, ParameterCondition } from "./conditions";
import { MetadataConstraint } from "./constraints";
import { ConfigurationError } from "./errors";
import { BUILTIN_FORMATS } from "./formats";
import { InputTemplate } from "./input_template";
import { isScalar } from "./metadata";
import type { AttributeRule, FormatClass } from "./metadata";
import {
  CopyMetaField,
  ParameterMetaField,
  SetMetaField,
  UnsetMetaField,
} from "./metafields";
import type { MetaField } from "./metafields";
import { OutputTemplate } from "./output_template";
import type { MetaFieldRule, RemoveExtensions } from "./output_template";
import { Parameter } from "./parameters";
import { Profile } from "./profile";
import type { OutputEntry } from "./profile";
import type { CopyPolicy, ParameterType, ScalarValue } from "./types";

export interface ServiceSettings {
  copyPolicy: CopyPolicy;
}

export interface ServiceDefinition {
  serviceId?: string;
  settings: ServiceSettings;
  formats: Record<string, FormatClass>;
  profiles: Profile[];
}

const PARAMETER_TYPES: readonly ParameterType[] = ["string", "text", "integer", "float", "boolean", "choice"];
const COPY_POLICIES: readonly CopyPolicy[] = ["first", "last", "error"];

const warned = new Set<string>();

function warnOnce(key: string, message: string): void {
  if (warned.has(key)) return;
  warned.add(key);
  console.warn(message);
}

/** Version of the service definition layout this loader reads */
export const SPEC_VERSION = "0.1.0";

/** Definitions written for another major version are refused */
function checkSpecVersion(value: unknown): void {
  const version = typeof value === "number" ? String(value) : value;
  if (typeof version !== "string" || !/^\d+(\.\d+){0,2}$/.test(version)) {
    throw new ConfigurationError(`Invalid spec_version '${String(value)}' (expected a version such as '${SPEC_VERSION}')`);
  }
  const major = version.split(".")[0];
  const supported = SPEC_VERSION.split(".")[0];
  if (major !== supported) {
    throw new ConfigurationError(`Unsupported spec_version '${version}': this loader reads ${supported}.x definitions`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load a service definition from a YAML file path or an already parsed
 * document. Both the wrapped (spec/data) and the bare data layout work.
 */
export function loadServiceConfig(source: string | Record<string, unknown>): ServiceDefinition {
  if (typeof source === "string") {
    if (!existsSync(source)) {
      throw new ConfigurationError(`Service definition not found: ${source}`);
    }
    return parseServiceConfig(readFileSync(source, "utf-8"));
  }
  return buildService(source);
}

export function parseServiceConfig(text: string): ServiceDefinition {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in service definition: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError("Service definition must be a mapping");
  }
  return buildService(parsed);
}

function buildService(config: Record<string, unknown>): ServiceDefinition {
  if ("spec" in config && config.spec !== "formatprofiles") {
    throw new ConfigurationError(`Invalid service spec: expected 'formatprofiles', got '${String(config.spec)}'`);
  }
  if ("spec_version" in config) checkSpecVersion(config.spec_version);
  const data = "data" in config ? config.data : config;
  if (!isRecord(data)) {
    throw new ConfigurationError("Service definition 'data' must be a mapping");
  }

  const formats: Record<string, FormatClass> = { ...BUILTIN_FORMATS };
  if (data.formats !== undefined && data.formats !== null) {
    if (!isRecord(data.formats)) throw new ConfigurationError("'formats' must be a mapping");
    for (const [id, raw] of Object.entries(data.formats)) {
      if (id in BUILTIN_FORMATS) {
        warnOnce(`format:${id}`, `[formatprofiles] format '${id}' replaces the built-in format of the same name`);
      }
      formats[id] = buildFormat(id, raw);
    }
  }

  const settings = isRecord(data.settings) ? data.settings : {};
  const copyPolicy = settings.copy_policy ?? "last";
  if (!isOneOf(copyPolicy, COPY_POLICIES)) {
    throw new ConfigurationError(`Invalid copy_policy '${String(copyPolicy)}' (expected first, last or error)`);
  }

  const profiles = list(data.profiles, "profiles").map((raw, index) =>
    buildProfile(expectRecord(raw, `profiles[${index}]`), formats)
  );
  const seen = new Set<string>();
  for (const profile of profiles) {
    if (seen.has(profile.id)) throw new ConfigurationError(`Duplicate profile id '${profile.id}'`);
    seen.add(profile.id);
  }

  return {
    serviceId: optionalString(data, "service_id", "data"),
    settings: { copyPolicy },
    formats,
    profiles,
  };
}

function buildFormat(id: string, raw: unknown): FormatClass {
  const where = `formats.${id}`;
  const config = raw === null || raw === undefined ? {} : expectRecord(raw, where);
  let attributes: Record<string, AttributeRule> | null = null;
  if (config.attributes !== undefined && config.attributes !== null) {
    attributes = {};
    for (const [key, rule] of Object.entries(expectRecord(config.attributes, `${where}.attributes`))) {
      attributes[key] = buildAttributeRule(rule, `${where}.attributes.${key}`);
    }
  }
  return {
    id,
    label: optionalString(config, "label", where),
    mimetype: optionalString(config, "mimetype", where),
    schema: optionalString(config, "schema", where),
    attributes,
    allowCustomAttributes: optionalBoolean(config, "allow_custom_attributes", where) ?? attributes === null,
  };
}

function buildAttributeRule(raw: unknown, where: string): AttributeRule {
  if (raw === "required") return { kind: "required" };
  if (raw === "optional") return { kind: "optional" };
  if (Array.isArray(raw)) {
    const values: ScalarValue[] = [];
    let allowAbsent = false;
    for (const value of raw) {
      if (value === null) {
        allowAbsent = true;
      } else if (isScalar(value)) {
        values.push(value);
      } else {
        throw new ConfigurationError(`${where}: enumerated values must be scalars or null`);
      }
    }
    return { kind: "enumerated", values, allowAbsent };
  }
  if (isRecord(raw) && "fixed" in raw) {
    return { kind: "fixed", value: scalar(raw.fixed, `${where}.fixed`) };
  }
  throw new ConfigurationError(`${where}: expected 'required', 'optional', a list of values or { fixed: value }`);
}

function buildProfile(config: Record<string, unknown>, formats: Record<string, FormatClass>): Profile {
  const id = requireString(config, "id", "profile");
  const where = `profile '${id}'`;
  const input = config.input === undefined || config.input === null
    ? []
    : list(config.input, `${where} input`).map((raw, index) =>
        buildInputTemplate(expectRecord(raw, `${where} input[${index}]`), formats)
      );
  const output = list(config.output, `${where} output`).map((raw, index) =>
    buildOutputEntry(raw, formats, `${where} output[${index}]`)
  );
  return new Profile({ id, label: optionalString(config, "label", where), input, output });
}

function lookupFormat(config: Record<string, unknown>, formats: Record<string, FormatClass>, where: string): FormatClass {
  const formatId = requireString(config, "format", where);
  const format = formats[formatId];
  if (!format) throw new ConfigurationError(`${where}: unknown format '${formatId}'`);
  return format;
}

function buildInputTemplate(config: Record<string, unknown>, formats: Record<string, FormatClass>): InputTemplate {
  const id = requireString(config, "id", "input template");
  const where = `input template '${id}'`;
  const parameters = config.parameters === undefined || config.parameters === null
    ? []
    : list(config.parameters, `${where} parameters`).map((raw, index) =>
        buildParameter(expectRecord(raw, `${where} parameters[${index}]`), `${where} parameters[${index}]`)
      );
  const constraints = config.constraints === undefined || config.constraints === null
    ? []
    : list(config.constraints, `${where} constraints`).map((raw, index) =>
        buildConstraint(raw, `${where} constraints[${index}]`)
      );
  return new InputTemplate({
    id,
    format: lookupFormat(config, formats, where),
    label: requireString(config, "label", where),
    unique: optionalBoolean(config, "unique", where),
    filename: optionalString(config, "filename", where),
    extension: optionalString(config, "extension", where),
    acceptArchive: optionalBoolean(config, "accept_archive", where),
    parameters,
    constraints,
  });
}

function buildConstraint(raw: unknown, where: string): MetadataConstraint {
  const config = expectRecord(raw, where);
  const operator = config.operator ?? "equals";
  if (!isOneOf(operator, CONDITION_OPERATORS)) {
    throw new ConfigurationError(`${where}: unknown operator '${String(operator)}'`);
  }
  const value = Array.isArray(config.value)
    ? config.value.map((item, index) => scalar(item, `${where}.value[${index}]`))
    : scalar(config.value, `${where}.value`);
  try {
    return new MetadataConstraint({ key: requireString(config, "key", where), value, operator });
  } catch (error) {
    if (error instanceof ConfigurationError) throw new ConfigurationError(`${where}: ${error.message}`);
    throw error;
  }
}

function buildParameter(config: Record<string, unknown>, where: string): Parameter {
  const type = config.type;
  if (!isOneOf(type, PARAMETER_TYPES)) {
    throw new ConfigurationError(`${where}: invalid parameter type '${String(type)}'`);
  }
  let choices: string[] | Record<string, string> | undefined;
  if (Array.isArray(config.choices)) {
    choices = config.choices.map((choice, index) => String(scalar(choice, `${where}.choices[${index}]`)));
  } else if (isRecord(config.choices)) {
    choices = Object.fromEntries(
      Object.entries(config.choices).map(([key, label]) => [key, String(scalar(label, `${where}.choices.${key}`))])
    );
  }
  let defaultValue: ScalarValue | ScalarValue[] | undefined;
  if (Array.isArray(config.default)) {
    defaultValue = config.default.map((value, index) => scalar(value, `${where}.default[${index}]`));
  } else if (config.default !== undefined && config.default !== null) {
    defaultValue = scalar(config.default, `${where}.default`);
  }
  return new Parameter({
    id: requireString(config, "id", where),
    type,
    name: optionalString(config, "name", where),
    description: optionalString(config, "description", where),
    required: optionalBoolean(config, "required", where),
    default: defaultValue,
    choices,
    multi: optionalBoolean(config, "multi", where),
    min: optionalNumber(config, "min", where),
    max: optionalNumber(config, "max", where),
    maxlength: optionalNumber(config, "maxlength", where),
    forbid: optionalStringList(config, "forbid", where),
    require: optionalStringList(config, "require", where),
    allowUsers: optionalStringList(config, "allow_users", where),
    denyUsers: optionalStringList(config, "deny_users", where),
  });
}

function buildOutputEntry(raw: unknown, formats: Record<string, FormatClass>, where: string): OutputEntry {
  const config = expectRecord(raw, where);
  if ("condition" in config) {
    return buildCondition(config.condition, `${where}.condition`, (branch, at) =>
      buildOutputTemplate(expectRecord(branch, at), formats, at)
    );
  }
  return buildOutputTemplate(config, formats, where);
}

function buildOutputTemplate(
  config: Record<string, unknown>,
  formats: Record<string, FormatClass>,
  at: string
): OutputTemplate {
  const id = requireString(config, "id", at);
  const where = `output template '${id}'`;
  let removeExtensions: RemoveExtensions | undefined;
  if (config.remove_extensions === "all" || config.remove_extensions === "none") {
    removeExtensions = config.remove_extensions;
  } else if (config.remove_extensions !== undefined) {
    removeExtensions = optionalStringList(config, "remove_extensions", where);
  }
  const metafields = config.metafields === undefined || config.metafields === null
    ? []
    : list(config.metafields, `${where} metafields`).map((rule, index) =>
        buildMetaFieldRule(rule, `${where} metafields[${index}]`)
      );
  return new OutputTemplate({
    id,
    format: lookupFormat(config, formats, where),
    label: requireString(config, "label", where),
    unique: optionalBoolean(config, "unique", where),
    filename: optionalString(config, "filename", where),
    extension: optionalString(config, "extension", where),
    removeExtensions,
    parent: optionalString(config, "parent", where),
    copyMetadata: optionalBoolean(config, "copy_metadata", where),
    metafields,
  });
}

function buildMetaFieldRule(raw: unknown, where: string): MetaFieldRule {
  const config = expectRecord(raw, where);
  if ("condition" in config) {
    return buildCondition(config.condition, `${where}.condition`, buildMetaField);
  }
  return buildMetaField(config, where);
}

function buildMetaField(raw: unknown, where: string): MetaField {
  const config = expectRecord(raw, where);
  const operators = Object.keys(config);
  if (operators.length !== 1) {
    throw new ConfigurationError(`${where}: expected exactly one of set, unset, copy, parameter`);
  }
  if (isRecord(config.set)) {
    return new SetMetaField(requireString(config.set, "key", where), scalar(config.set.value, `${where}.set.value`));
  }
  if (isRecord(config.unset)) {
    const value = config.unset.value;
    return new UnsetMetaField(
      requireString(config.unset, "key", where),
      value === undefined || value === null ? undefined : scalar(value, `${where}.unset.value`)
    );
  }
  if (isRecord(config.copy)) {
    return new CopyMetaField(requireString(config.copy, "key", where), requireString(config.copy, "from", where));
  }
  if (isRecord(config.parameter)) {
    return new ParameterMetaField(
      requireString(config.parameter, "key", where),
      requireString(config.parameter, "parameter", where)
    );
  }
  throw new ConfigurationError(`${where}: unknown metafield operator '${operators[0]}'`);
}

function buildCondition<T>(
  raw: unknown,
  where: string,
  buildTerminal: (raw: unknown, where: string) => T
): ParameterCondition<T> {
  const config = expectRecord(raw, where);
  const branch = (value: unknown, at: string): T | ParameterCondition<T> =>
    isRecord(value) && "condition" in value
      ? buildCondition(value.condition, `${at}.condition`, buildTerminal)
      : buildTerminal(value, at);

  if (config.then === undefined || config.then === null) {
    throw new ConfigurationError(`${where}: a condition requires 'then'`);
  }
  const conditions = list(config.conditions, `${where}.conditions`).map((clause, index) => {
    const at = `${where}.conditions[${index}]`;
    const entry = expectRecord(clause, at);
    const operator = entry.operator ?? "equals";
    if (!isOneOf(operator, CONDITION_OPERATORS)) {
      throw new ConfigurationError(`${at}: unknown operator '${String(operator)}'`);
    }
    return { key: requireString(entry, "key", at), value: scalar(entry.value, `${at}.value`), operator };
  });
  return new ParameterCondition<T>({
    conditions,
    disjunction: optionalBoolean(config, "disjunction", where),
    then: branch(config.then, `${where}.then`),
    otherwise: config.otherwise === undefined || config.otherwise === null
      ? undefined
      : branch(config.otherwise, `${where}.otherwise`),
  });
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === "string" && allowed.some((option) => option === value);
}

function expectRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) throw new ConfigurationError(`${where}: expected a mapping`);
  return value;
}

function list(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) throw new ConfigurationError(`${where}: expected a list`);
  return value;
}

function scalar(value: unknown, where: string): ScalarValue {
  if (!isScalar(value)) throw new ConfigurationError(`${where}: expected a string, number or boolean`);
  return value;
}

function requireString(config: Record<string, unknown>, key: string, where: string): string {
  const value = config[key];
  if (typeof value !== "string" || !value) {
    throw new ConfigurationError(`${where}: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalString(config: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = config[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") throw new ConfigurationError(`${where}: '${key}' must be a string`);
  return value;
}

function optionalBoolean(config: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = config[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ConfigurationError(`${where}: '${key}' must be true or false`);
  return value;
}

function optionalNumber(config: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = config[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") throw new ConfigurationError(`${where}: '${key}' must be a number`);
  return value;
}

function optionalStringList(config: Record<string, unknown>, key: string, where: string): string[] | undefined {
  const value = config[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigurationError(`${where}: '${key}' must be a list of strings`);
  }
  return value;
}
