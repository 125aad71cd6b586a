import { ConfigurationError } from "./errors";
import type { ConditionOperator, ParameterValue, ScalarValue, SubmittedParameters } from "./types";

export const MAX_CONDITION_DEPTH = 64;

export const CONDITION_OPERATORS: readonly ConditionOperator[] = [
  "equals",
  "notequals",
  "contains",
  "greaterthan",
  "greaterequalthan",
  "lessthan",
  "lessequalthan",
];

export interface ConditionClause {
  key: string;
  value: ScalarValue;
  operator: ConditionOperator;
}

export type Branch<T> =
  | { kind: "terminal"; value: T }
  | { kind: "condition"; condition: ParameterCondition<T> };

export interface ParameterConditionOptions<T> {
  conditions: { key: string; value: ScalarValue; operator?: ConditionOperator }[];
  disjunction?: boolean;
  then: T | ParameterCondition<T>;
  otherwise?: T | ParameterCondition<T>;
}

function toBranch<T>(value: T | ParameterCondition<T>): Branch<T> {
  return value instanceof ParameterCondition
    ? { kind: "condition", condition: value }
    : { kind: "terminal", value };
}

function asNumber(value: ParameterValue | null): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

function equalValues(actual: ParameterValue | null, expected: ScalarValue): boolean {
  if (actual === null || Array.isArray(actual)) return false;
  if (actual === expected) return true;
  // "3" from a form and 3 from a config file are the same value
  if (typeof actual !== typeof expected && typeof actual !== "boolean" && typeof expected !== "boolean") {
    return asNumber(actual) !== undefined && asNumber(actual) === asNumber(expected);
  }
  return false;
}

function compare(actual: ParameterValue | null, expected: ScalarValue): number | undefined {
  const left = asNumber(actual);
  const right = asNumber(expected);
  if (left !== undefined && right !== undefined) return left - right;
  if (typeof actual === "string" && typeof expected === "string") {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return undefined;
}

export function applyOperator(
  operator: ConditionOperator,
  actual: ParameterValue | null,
  expected: ScalarValue
): boolean {
  switch (operator) {
    case "equals":
      return equalValues(actual, expected);
    case "notequals":
      return !equalValues(actual, expected);
    case "contains":
      if (Array.isArray(actual)) return actual.some((item) => equalValues(item, expected));
      return typeof actual === "string" && actual.includes(String(expected));
    case "greaterthan": {
      const order = compare(actual, expected);
      return order !== undefined && order > 0;
    }
    case "greaterequalthan": {
      const order = compare(actual, expected);
      return order !== undefined && order >= 0;
    }
    case "lessthan": {
      const order = compare(actual, expected);
      return order !== undefined && order < 0;
    }
    case "lessequalthan": {
      const order = compare(actual, expected);
      return order !== undefined && order <= 0;
    }
  }
}

/**
 * Predicate over submitted parameters choosing between alternatives.
 *
 * `then` and `otherwise` are either a terminal value (a template, a metafield)
 * or another condition. The structure is checked to be a finite tree when it
 * is built, so evaluation always terminates.
 *
 * @example
 * ```typescript
 * const pick = new ParameterCondition({
 *   conditions: [{ key: "lang", value: "en" }],
 *   then: englishOutput,
 *   otherwise: genericOutput,
 * });
 * pick.evaluate({ lang: "en" }); // englishOutput
 * ```
 */
export class ParameterCondition<T> {
  readonly conditions: ConditionClause[];
  readonly disjunction: boolean;
  readonly then: Branch<T>;
  readonly otherwise?: Branch<T>;

  constructor(options: ParameterConditionOptions<T>) {
    if (options.then === undefined || options.then === null) {
      throw new ConfigurationError("ParameterCondition requires a 'then' branch");
    }
    this.conditions = options.conditions.map(({ key, value, operator }) => {
      const op = operator ?? "equals";
      if (!CONDITION_OPERATORS.includes(op)) {
        throw new ConfigurationError(`Unknown condition operator '${op}' for '${key}'`);
      }
      return { key, value, operator: op };
    });
    this.disjunction = options.disjunction ?? false;
    this.then = toBranch(options.then);
    this.otherwise = options.otherwise !== undefined ? toBranch(options.otherwise) : undefined;
    this.checkTree(new Set(), 0);
  }

  private checkTree(visiting: Set<ParameterCondition<T>>, depth: number): void {
    if (depth > MAX_CONDITION_DEPTH) {
      throw new ConfigurationError(`ParameterCondition nesting exceeds ${MAX_CONDITION_DEPTH} levels`);
    }
    if (visiting.has(this)) {
      throw new ConfigurationError("ParameterCondition contains a cycle");
    }
    visiting.add(this);
    for (const branch of [this.then, this.otherwise]) {
      if (branch?.kind === "condition") branch.condition.checkTree(visiting, depth + 1);
    }
    visiting.delete(this);
  }

  match(parameters: SubmittedParameters): boolean {
    for (const { key, value, operator } of this.conditions) {
      const actual = parameters[key] ?? null;
      if (applyOperator(operator, actual, value)) {
        if (this.disjunction) return true;
      } else if (!this.disjunction) {
        return false;
      }
    }
    return !this.disjunction;
  }

  /** The selected terminal, or undefined when no branch applies */
  evaluate(parameters: SubmittedParameters): T | undefined {
    if (this.match(parameters)) return resolveBranch(this.then, parameters);
    if (this.otherwise) return resolveBranch(this.otherwise, parameters);
    return undefined;
  }

  /** Every terminal reachable through then/otherwise, depth first */
  allPossibilities(): T[] {
    const found: T[] = [];
    for (const branch of [this.then, this.otherwise]) {
      if (!branch) continue;
      if (branch.kind === "terminal") {
        found.push(branch.value);
      } else {
        found.push(...branch.condition.allPossibilities());
      }
    }
    return found;
  }

  toJSON(): object {
    return {
      conditions: this.conditions,
      disjunction: this.disjunction,
      then: branchToJSON(this.then),
      ...(this.otherwise ? { otherwise: branchToJSON(this.otherwise) } : {}),
    };
  }
}

function resolveBranch<T>(branch: Branch<T>, parameters: SubmittedParameters): T | undefined {
  return branch.kind === "terminal" ? branch.value : branch.condition.evaluate(parameters);
}

function branchToJSON<T>(branch: Branch<T>): unknown {
  return branch.kind === "terminal" ? branch.value : branch.condition.toJSON();
}
