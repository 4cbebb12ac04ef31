/**
 * Site checking - call arguments, returned values and assignments
 */

import {
  errorAt,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import type { MethodSetType } from "../types/method-set.js";
import type {
  AssignmentSite,
  CallSite,
  CheckSite,
  ReturnSite,
  TypeExpression,
} from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import { methodsType } from "../types/type-expression.js";
import {
  lookupMethod,
  formatSignature,
  type FrozenMethodRegistry,
} from "../registry/index.js";
import type { TypeEvaluator } from "../lattice/index.js";
import { checkCall, type CheckVerdict } from "./compatibility.js";

export type SiteReport = {
  readonly site: CheckSite;
  readonly verdicts: readonly CheckVerdict[];
  /** Why the site, or part of it, could not be checked */
  readonly unresolved: readonly Diagnostic[];
  /** Errors in the callee's declared types, placed at its signature */
  readonly signatureErrors: readonly Diagnostic[];
  /** `unresolved`, then `signatureErrors`, then the failed verdicts */
  readonly diagnostics: readonly Diagnostic[];
};

export type SiteContext = {
  readonly registry: FrozenMethodRegistry;
  readonly evaluator: TypeEvaluator;
};

type TypePair = readonly [MethodSetType, MethodSetType];

type PairErrors = {
  readonly value: readonly Diagnostic[];
  readonly required: readonly Diagnostic[];
};

const report = (
  site: CheckSite,
  verdicts: readonly CheckVerdict[],
  unresolved: readonly Diagnostic[] = [],
  signatureErrors: readonly Diagnostic[] = []
): SiteReport => ({
  site,
  verdicts,
  unresolved,
  signatureErrors,
  diagnostics: [
    ...unresolved,
    ...signatureErrors,
    ...verdicts.flatMap((v) => (v.state === "failed" ? [v.diagnostic] : [])),
  ],
});

/**
 * Evaluate a value type and the type it must satisfy, keeping the errors of both
 */
const evaluatePair = (
  evaluator: TypeEvaluator,
  value: TypeExpression,
  required: TypeExpression,
  location: SourceLocation | undefined,
  requiredLocation: SourceLocation | undefined = location
): Result<TypePair, PairErrors> => {
  const valueType = evaluator.evaluate(value, location);
  const requiredType = evaluator.evaluate(required, requiredLocation);
  if (valueType.ok && requiredType.ok) {
    return ok([valueType.value, requiredType.value] as const);
  }
  return error({
    value: valueType.ok ? [] : valueType.error,
    required: requiredType.ok ? [] : requiredType.error,
  });
};

const checkCallSite = (ctx: SiteContext, site: CallSite): SiteReport => {
  const signature = lookupMethod(ctx.registry, site.method, site.location);
  if (!signature.ok) {
    return report(site, [], [signature.error]);
  }

  const params = signature.value.parameters;
  if (params.length !== site.arguments.length) {
    return report(site, [], [
      errorAt(
        "MTH3003",
        `'${site.method}' expects ${params.length} argument(s), got ${site.arguments.length}`,
        site.location,
        formatSignature(signature.value)
      ),
    ]);
  }

  const verdicts: CheckVerdict[] = [];
  const unresolved: Diagnostic[] = [];
  const signatureErrors: Diagnostic[] = [];

  site.arguments.forEach((argument, i) => {
    const param = params[i];
    if (!param) return;

    const pair = evaluatePair(
      ctx.evaluator,
      argument,
      param.type,
      site.location,
      signature.value.location ?? site.location
    );
    if (!pair.ok) {
      unresolved.push(...pair.error.value);
      signatureErrors.push(...pair.error.required);
      return;
    }

    const context = param.name
      ? `argument '${param.name}' of '${site.method}'`
      : `argument ${i + 1} of '${site.method}'`;
    verdicts.push(checkCall(pair.value[0], pair.value[1], site.location, context));
  });

  return report(site, verdicts, unresolved, signatureErrors);
};

const checkReturnSite = (ctx: SiteContext, site: ReturnSite): SiteReport => {
  const signature = lookupMethod(ctx.registry, site.method, site.location);
  if (!signature.ok) {
    return report(site, [], [signature.error]);
  }

  // A method without a declared return type places no requirement on the value
  const pair = evaluatePair(
    ctx.evaluator,
    site.value,
    signature.value.returnType ?? methodsType(),
    site.location,
    signature.value.location ?? site.location
  );
  if (!pair.ok) {
    return report(site, [], pair.error.value, pair.error.required);
  }

  return report(site, [
    checkCall(
      pair.value[0],
      pair.value[1],
      site.location,
      `return value of '${site.method}'`
    ),
  ]);
};

const checkAssignmentSite = (
  ctx: SiteContext,
  site: AssignmentSite
): SiteReport => {
  const pair = evaluatePair(
    ctx.evaluator,
    site.value,
    site.declaredType,
    site.location
  );
  if (!pair.ok) {
    return report(site, [], [...pair.error.value, ...pair.error.required]);
  }

  const context = site.variable
    ? `assignment to '${site.variable}'`
    : "assignment";
  return report(site, [
    checkCall(pair.value[0], pair.value[1], site.location, context),
  ]);
};

/**
 * Check one site. Sites share no mutable state, so the order they are
 * checked in does not change any verdict.
 */
export const checkSite = (ctx: SiteContext, site: CheckSite): SiteReport => {
  switch (site.kind) {
    case "call":
      return checkCallSite(ctx, site);
    case "return":
      return checkReturnSite(ctx, site);
    case "assignment":
      return checkAssignmentSite(ctx, site);
  }
};
