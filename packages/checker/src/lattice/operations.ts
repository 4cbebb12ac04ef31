/**
 * Type lattice operations over method-sets.
 *
 * Requirements compose by intersection (`A & B` needs everything both
 * need, so names are unioned); declared unions (`A | B`) only guarantee
 * what every branch has, so names are intersected. Subtyping is name-set
 * inclusion.
 */

import {
  createMethodSetType,
  emptyMethodSet,
  type MethodSetType,
} from "../types/method-set.js";

/**
 * `A & B`: a value must supply every method of both operands
 */
export const intersect = (a: MethodSetType, b: MethodSetType): MethodSetType =>
  createMethodSetType([...a.names, ...b.names]);

/**
 * `A | B`: only the methods present on both operands are available
 */
export const unionType = (a: MethodSetType, b: MethodSetType): MethodSetType =>
  createMethodSetType(a.names.filter((name) => b.members.has(name)));

/**
 * Intersection of any number of types; the empty intersection requires nothing
 */
export const intersectAll = (types: readonly MethodSetType[]): MethodSetType =>
  types.reduce(intersect, emptyMethodSet);

export const unionAll = (
  first: MethodSetType,
  ...rest: readonly MethodSetType[]
): MethodSetType => rest.reduce(unionType, first);

/**
 * Does `candidate` implement at least everything `required` names?
 */
export const satisfies = (
  candidate: MethodSetType,
  required: MethodSetType
): boolean => required.names.every((name) => candidate.members.has(name));

/**
 * Methods `required` names that `candidate` lacks, sorted
 */
export const missingMethods = (
  candidate: MethodSetType,
  required: MethodSetType
): readonly string[] =>
  required.names.filter((name) => !candidate.members.has(name));

export type LatticeCache = {
  readonly intersect: (a: MethodSetType, b: MethodSetType) => MethodSetType;
  readonly unionType: (a: MethodSetType, b: MethodSetType) => MethodSetType;
  readonly size: () => number;
};

/**
 * Memoise the binary operations by operand keys. Labels are not part of a
 * key, so cached results carry no label.
 */
export const createLatticeCache = (): LatticeCache => {
  const entries = new Map<string, MethodSetType>();

  const memo =
    (op: "&" | "|", fn: (a: MethodSetType, b: MethodSetType) => MethodSetType) =>
    (a: MethodSetType, b: MethodSetType): MethodSetType => {
      const cacheKey = `${a.key}${op}${b.key}`;
      const cached = entries.get(cacheKey);
      if (cached) return cached;
      const computed = fn(a, b);
      entries.set(cacheKey, computed);
      return computed;
    };

  return {
    intersect: memo("&", intersect),
    unionType: memo("|", unionType),
    size: () => entries.size,
  };
};
