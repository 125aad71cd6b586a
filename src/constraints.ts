import { applyOperator } from "./conditions";
import { ConfigurationError } from "./errors";
import type { FormatClass, MetadataRecord } from "./metadata";
import type { ConditionOperator, ScalarValue } from "./types";

export interface MetadataConstraintOptions {
  key: string;
  /** A list means membership in the listed values */
  value: ScalarValue | ScalarValue[];
  /** Defaults to "equals" */
  operator?: ConditionOperator;
}

/**
 * Requirement an input template places on one attribute of a file's
 * metadata. With a list value, `equals` accepts any listed value and
 * `notequals` none of them. An absent attribute only satisfies `notequals`.
 */
export class MetadataConstraint {
  readonly key: string;
  readonly operator: ConditionOperator;
  readonly value: ScalarValue | readonly ScalarValue[];

  constructor(options: MetadataConstraintOptions) {
    this.key = options.key;
    this.operator = options.operator ?? "equals";
    if (Array.isArray(options.value)) {
      if (this.operator !== "equals" && this.operator !== "notequals") {
        throw new ConfigurationError(
          `Constraint on '${this.key}': operator '${this.operator}' does not take a list of values`
        );
      }
      if (!options.value.length) {
        throw new ConfigurationError(`Constraint on '${this.key}': the list of values is empty`);
      }
      this.value = [...options.value];
    } else {
      this.value = options.value;
    }
  }

  test(record: MetadataRecord): boolean {
    const actual = record.get(this.key);
    if (actual === undefined) return this.operator === "notequals";

    const expected = this.value;
    if (typeof expected === "object") {
      const listed = expected.some((value) => applyOperator("equals", actual, value));
      return this.operator === "equals" ? listed : !listed;
    }
    return applyOperator(this.operator, actual, expected);
  }

  toJSON() {
    const value = this.value;
    return { key: this.key, operator: this.operator, value: typeof value === "object" ? [...value] : value };
  }
}

/** Whether a record has the template's format and meets all its constraints */
export function matchConstraints(
  format: FormatClass,
  constraints: readonly MetadataConstraint[],
  record: MetadataRecord
): boolean {
  if (record.format.id !== format.id) return false;
  return constraints.every((constraint) => constraint.test(record));
}
