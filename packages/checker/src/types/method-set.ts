/**
 * MethodSetType - the value every type in the checker reduces to.
 *
 * A method-set reads "supports at least these methods". Names are kept
 * sorted and unique so that two sets with the same members share one
 * canonical key, and values are frozen once built.
 */

export type MethodSetType = {
  readonly kind: "methodSet";
  readonly names: readonly string[];
  readonly members: ReadonlySet<string>;
  /** Canonical identity: equal keys mean equal sets */
  readonly key: string;
  /** Display name (alias or class); ignored by equality and subtyping */
  readonly label?: string;
};

export const createMethodSetType = (
  names: Iterable<string>,
  label?: string
): MethodSetType => {
  const sorted = [...new Set(names)].sort();
  return Object.freeze({
    kind: "methodSet" as const,
    names: Object.freeze(sorted),
    members: new Set(sorted),
    key: sorted.join(","),
    label,
  });
};

export const emptyMethodSet: MethodSetType = createMethodSetType([]);

export const withLabel = (type: MethodSetType, label: string): MethodSetType =>
  type.label === label ? type : createMethodSetType(type.names, label);

export const methodSetsEqual = (a: MethodSetType, b: MethodSetType): boolean =>
  a.key === b.key;

export const formatMethodNames = (names: readonly string[]): string =>
  `{${names.join(", ")}}`;

/**
 * Render a method-set for messages, e.g. `Closeable {close, isOpen}`
 */
export const formatMethodSet = (type: MethodSetType): string =>
  type.label
    ? `${type.label} ${formatMethodNames(type.names)}`
    : formatMethodNames(type.names);
