/**
 * Pass/fail thresholds checked against the final run summary, so a load
 * test can gate a CI job:
 *
 *   http-flood run 10.0.0.5 -d 30 --assert "success_rate >= 99%" --assert "rps > 500"
 *
 * A threshold written in `s` is converted to milliseconds, the unit of
 * `duration`. `ms` and `%` are taken as written.
 */

import type { RunSummary } from "../metrics/events.ts";

const COMPARATORS = {
  "<=": (actual: number, limit: number) => actual <= limit,
  ">=": (actual: number, limit: number) => actual >= limit,
  "!=": (actual: number, limit: number) => actual !== limit,
  "==": (actual: number, limit: number) => actual === limit,
  "<": (actual: number, limit: number) => actual < limit,
  ">": (actual: number, limit: number) => actual > limit,
} satisfies Record<string, (actual: number, limit: number) => boolean>;

export type Operator = keyof typeof COMPARATORS;

export interface Assertion {
  metric: string;
  operator: Operator;
  value: number;
  unit: string;
  raw: string;
}

export interface AssertionResult {
  assertion: Assertion;
  actual: number;
  passed: boolean;
}

// Two-character operators are listed first so "<=" is never read as "<".
const EXPRESSION = /^([A-Za-z_]\w*)\s*(<=|>=|!=|==|<|>)\s*(.*)$/;
const THRESHOLD = /^(\d+(?:\.\d+)?)\s*(ms|%|s)?$/;

function isOperator(op: string): op is Operator {
  return Object.hasOwn(COMPARATORS, op);
}

export function parseAssertion(raw: string): Assertion {
  const expr = EXPRESSION.exec(raw.trim());
  const operator = expr?.[2] ?? "";
  if (!expr || !isOperator(operator)) {
    throw new Error(
      `Invalid assertion: "${raw}". Expected "<metric> <op> <value>", e.g. "rps > 100"`,
    );
  }

  const threshold = THRESHOLD.exec(expr[3]);
  if (!threshold) {
    throw new Error(`Invalid assertion value: "${expr[3]}" in "${raw}"`);
  }

  const unit = threshold[2] ?? "";
  const number = parseFloat(threshold[1]);
  return {
    metric: expr[1],
    operator,
    value: unit === "s" ? number * 1000 : number,
    unit,
    raw,
  };
}

export function parseAssertions(exprs: string[]): Assertion[] {
  return exprs.map(parseAssertion);
}

/** A metric missing from `stats` fails with an actual of NaN. */
export function evaluateAssertions(
  assertions: Assertion[],
  stats: Record<string, number>,
): AssertionResult[] {
  return assertions.map((assertion) => {
    const actual = stats[assertion.metric];
    if (actual === undefined) {
      return { assertion, actual: NaN, passed: false };
    }
    const compare = COMPARATORS[assertion.operator];
    return { assertion, actual, passed: compare(actual, assertion.value) };
  });
}

/** Flat metric map of a run summary for assertion evaluation. */
export function summaryToAssertionMap(s: RunSummary): Record<string, number> {
  return {
    rps: s.averageRate,
    requests: s.total,
    successes: s.success,
    errors: s.fail,
    success_rate: s.successPercent,
    error_rate: s.failPercent,
    duration: s.elapsedMs,
    abandoned: s.abandonedWorkers,
  };
}
