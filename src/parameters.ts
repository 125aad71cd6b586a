import { ConfigurationError } from "./errors";
import type { ParameterType, ParameterValue, ScalarValue } from "./types";

export interface ParameterOptions {
  id: string;
  type: ParameterType;
  name?: string;
  description?: string;
  required?: boolean;
  default?: ParameterValue;
  /** choice only: allowed values, or value -> label */
  choices?: string[] | Record<string, string>;
  multi?: boolean;
  min?: number;
  max?: number;
  maxlength?: number;
  forbid?: string[];
  require?: string[];
  allowUsers?: string[];
  denyUsers?: string[];
}

type Coerced = { ok: true; value: ParameterValue } | { ok: false; error: string };

const TRUE_STRINGS = new Set(["1", "true", "yes", "on"]);
const FALSE_STRINGS = new Set(["0", "false", "no", "off", ""]);

/**
 * A parameter the user sets when submitting a file or a job.
 *
 * Parameters declared on a template are shared configuration. Anything that
 * records a submission (value, error) must work on a clone().
 */
export class Parameter {
  readonly id: string;
  readonly type: ParameterType;
  readonly name: string;
  readonly description?: string;
  readonly required: boolean;
  readonly choices?: Record<string, string>;
  readonly multi: boolean;
  readonly forbid: string[];
  readonly require: string[];
  value?: ParameterValue;
  error?: string;
  private readonly options: ParameterOptions;

  constructor(options: ParameterOptions) {
    if (!options.id || /\s/.test(options.id)) {
      throw new ConfigurationError(`Invalid parameter id '${options.id}'`);
    }
    if (options.type === "choice" && !options.choices) {
      throw new ConfigurationError(`Choice parameter '${options.id}' declares no choices`);
    }
    if (options.type !== "choice" && options.multi) {
      throw new ConfigurationError(`Only choice parameters can be multi-valued ('${options.id}')`);
    }
    this.options = options;
    this.id = options.id;
    this.type = options.type;
    this.name = options.name ?? options.id;
    this.description = options.description;
    this.required = options.required ?? false;
    this.multi = options.multi ?? false;
    this.forbid = options.forbid ?? [];
    this.require = options.require ?? [];
    if (options.choices) {
      this.choices = Array.isArray(options.choices)
        ? Object.fromEntries(options.choices.map((c) => [c, c]))
        : { ...options.choices };
    }
    if (options.default !== undefined) {
      const coerced = this.coerce(options.default);
      if (!coerced.ok) {
        throw new ConfigurationError(`Invalid default for parameter '${this.id}': ${coerced.error}`);
      }
      this.value = coerced.value;
    }
  }

  clone(): Parameter {
    const copy = new Parameter(this.options);
    copy.value = Array.isArray(this.value) ? [...this.value] : this.value;
    copy.error = this.error;
    return copy;
  }

  /** Whether the parameter currently holds a value that counts as set */
  hasValue(): boolean {
    if (this.value === undefined || this.value === false || this.value === "") return false;
    return !(Array.isArray(this.value) && this.value.length === 0);
  }

  /** May this user set the parameter? */
  access(user?: string): boolean {
    if (user !== undefined && this.options.denyUsers?.includes(user)) return false;
    if (this.options.allowUsers) {
      return user !== undefined && this.options.allowUsers.includes(user);
    }
    return true;
  }

  /**
   * Coerce and store a submitted value. On failure the error is recorded on
   * the parameter and false is returned.
   */
  set(raw: unknown): boolean {
    const coerced = this.coerce(raw);
    if (!coerced.ok) {
      this.error = coerced.error;
      return false;
    }
    this.value = coerced.value;
    this.error = undefined;
    return true;
  }

  private coerce(raw: unknown): Coerced {
    switch (this.type) {
      case "boolean":
        return coerceBoolean(raw);
      case "integer":
        return this.checkRange(coerceNumber(raw, true));
      case "float":
        return this.checkRange(coerceNumber(raw, false));
      case "string":
      case "text":
        return this.coerceString(raw);
      case "choice":
        return this.coerceChoice(raw);
    }
  }

  private checkRange(coerced: Coerced): Coerced {
    if (!coerced.ok || typeof coerced.value !== "number") return coerced;
    const { min, max } = this.options;
    if (min !== undefined && coerced.value < min) {
      return { ok: false, error: `Value must be at least ${min}` };
    }
    if (max !== undefined && coerced.value > max) {
      return { ok: false, error: `Value must be at most ${max}` };
    }
    return coerced;
  }

  private coerceString(raw: unknown): Coerced {
    if (typeof raw !== "string" && typeof raw !== "number") {
      return { ok: false, error: "Expected a text value" };
    }
    const value = String(raw);
    if (this.type === "string" && value.includes("\n")) {
      return { ok: false, error: "Value must be a single line" };
    }
    const maxlength = this.options.maxlength;
    if (maxlength !== undefined && value.length > maxlength) {
      return { ok: false, error: `Value may be at most ${maxlength} characters long` };
    }
    return { ok: true, value };
  }

  private coerceChoice(raw: unknown): Coerced {
    const choices = this.choices ?? {};
    const values = Array.isArray(raw) ? raw : [raw];
    if (!this.multi && values.length !== 1) {
      return { ok: false, error: "Exactly one choice must be selected" };
    }
    const selected: ScalarValue[] = [];
    for (const value of values) {
      const key = typeof value === "number" ? String(value) : value;
      if (typeof key !== "string" || !(key in choices)) {
        return { ok: false, error: `Invalid choice '${String(value)}'` };
      }
      selected.push(key);
    }
    return this.multi ? { ok: true, value: selected } : { ok: true, value: selected[0] ?? "" };
  }

  toJSON() {
    return {
      id: this.id,
      type: this.type,
      name: this.name,
      ...(this.description ? { description: this.description } : {}),
      required: this.required,
      ...(this.choices ? { choices: this.choices } : {}),
      ...(this.multi ? { multi: true } : {}),
      ...(this.forbid.length ? { forbid: this.forbid } : {}),
      ...(this.require.length ? { require: this.require } : {}),
      ...(this.value !== undefined ? { value: this.value } : {}),
      ...(this.error ? { error: this.error } : {}),
    };
  }
}

function coerceBoolean(raw: unknown): Coerced {
  if (typeof raw === "boolean") return { ok: true, value: raw };
  if (raw === 1 || raw === 0) return { ok: true, value: raw === 1 };
  if (typeof raw === "string") {
    const lowered = raw.trim().toLowerCase();
    if (TRUE_STRINGS.has(lowered)) return { ok: true, value: true };
    if (FALSE_STRINGS.has(lowered)) return { ok: true, value: false };
  }
  return { ok: false, error: "Expected a boolean value" };
}

function coerceNumber(raw: unknown, integer: boolean): Coerced {
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim() !== "") {
    value = Number(raw.trim());
  } else {
    return { ok: false, error: integer ? "Expected an integer" : "Expected a number" };
  }
  if (Number.isNaN(value) || (integer && !Number.isInteger(value))) {
    return { ok: false, error: integer ? "Expected an integer" : "Expected a number" };
  }
  return { ok: true, value };
}
