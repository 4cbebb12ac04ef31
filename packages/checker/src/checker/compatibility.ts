/**
 * Compatibility checks: does an argument's method-set satisfy a parameter's?
 *
 * A check starts pending and settles in one step as passed or failed.
 * A failure is a permanent diagnostic; nothing is retried.
 */

import {
  createDiagnostic,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import {
  formatMethodNames,
  formatMethodSet,
  type MethodSetType,
} from "../types/method-set.js";
import { missingMethods } from "../lattice/index.js";

export type CheckState = "pending" | "passed" | "failed";

export type PendingCheck = {
  readonly state: "pending";
  readonly argument: MethodSetType;
  readonly parameter: MethodSetType;
  readonly location?: SourceLocation;
  /** What is being checked, e.g. "argument 1 of 'pipe'" */
  readonly context?: string;
};

export type PassedCheck = {
  readonly state: "passed";
  readonly location?: SourceLocation;
  readonly context?: string;
};

export type FailedCheck = {
  readonly state: "failed";
  readonly location?: SourceLocation;
  readonly context?: string;
  readonly missing: readonly string[];
  readonly diagnostic: Diagnostic;
};

export type CheckVerdict = PassedCheck | FailedCheck;

export const createCheck = (
  argument: MethodSetType,
  parameter: MethodSetType,
  location?: SourceLocation,
  context?: string
): PendingCheck => ({
  state: "pending",
  argument,
  parameter,
  location,
  context,
});

export const runCheck = (check: PendingCheck): CheckVerdict => {
  const missing = missingMethods(check.argument, check.parameter);
  if (missing.length === 0) {
    return { state: "passed", location: check.location, context: check.context };
  }

  const subject = check.context ? `${check.context}: ` : "";
  const diagnostic = createDiagnostic(
    "MTH3002",
    "error",
    `${subject}${formatMethodSet(check.argument)} does not satisfy ${formatMethodSet(check.parameter)}, missing ${formatMethodNames(missing)}`,
    check.location,
    undefined,
    missing
  );

  return {
    state: "failed",
    location: check.location,
    context: check.context,
    missing,
    diagnostic,
  };
};

/**
 * Check one argument against one parameter
 */
export const checkCall = (
  argType: MethodSetType,
  paramType: MethodSetType,
  location?: SourceLocation,
  context?: string
): CheckVerdict => runCheck(createCheck(argType, paramType, location, context));

export const isFailed = (verdict: CheckVerdict): verdict is FailedCheck =>
  verdict.state === "failed";
