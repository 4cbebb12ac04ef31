/**
 * Program loader - reads and validates a JSON program description.
 *
 * The file is what a front end hands the checker: method declarations,
 * interface aliases, class bodies and the sites to check. Validation walks
 * the parsed JSON and reports each bad field with its JSON path.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  errorAt,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import type {
  CheckSite,
  ClassDefinition,
  InterfaceAlias,
  MethodImplementation,
  MethodImport,
  MethodSignature,
  ParameterDeclaration,
  ProgramInput,
  TypeExpression,
} from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";

type JsonObject = { readonly [key: string]: unknown };

type Reader = {
  readonly fileName: string;
  readonly diagnostics: Diagnostic[];
};

const METHOD_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const TYPE_KEYS = ["methods", "alias", "class", "allOf", "anyOf"] as const;

const invalid = (reader: Reader, at: string, expected: string): undefined => {
  reader.diagnostics.push(
    errorAt(
      "MTH9005",
      `Invalid ${at} in ${path.basename(reader.fileName)}: expected ${expected}`
    )
  );
  return undefined;
};

const readString = (
  reader: Reader,
  value: unknown,
  at: string,
  pattern?: RegExp
): string | undefined => {
  if (typeof value !== "string" || (pattern && !pattern.test(value))) {
    return invalid(reader, at, pattern ? "a valid name" : "a string");
  }
  return value;
};

const readOptionalString = (
  reader: Reader,
  value: unknown,
  at: string,
  pattern?: RegExp
): string | undefined =>
  value === undefined ? undefined : readString(reader, value, at, pattern);

const readArray = <T>(
  reader: Reader,
  value: unknown,
  at: string,
  readItem: (item: unknown, itemAt: string) => T | undefined
): readonly T[] | undefined => {
  if (!Array.isArray(value)) {
    return invalid(reader, at, "an array");
  }
  const items: T[] = [];
  let failed = false;
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    const read = readItem(item, `${at}[${i}]`);
    if (read === undefined) {
      failed = true;
    } else {
      items.push(read);
    }
  }
  return failed ? undefined : items;
};

const readOptionalArray = <T>(
  reader: Reader,
  value: unknown,
  at: string,
  readItem: (item: unknown, itemAt: string) => T | undefined
): readonly T[] | undefined =>
  value === undefined ? [] : readArray(reader, value, at, readItem);

const readLocation = (
  reader: Reader,
  value: unknown,
  at: string
): SourceLocation | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "a location object");
  }
  const line = value.line;
  const column = value.column;
  const length = value.length ?? 0;
  if (
    typeof line !== "number" ||
    typeof column !== "number" ||
    typeof length !== "number"
  ) {
    return invalid(reader, at, "numeric 'line' and 'column'");
  }
  const file =
    value.file === undefined
      ? reader.fileName
      : readString(reader, value.file, `${at}.file`);
  return file === undefined ? undefined : { file, line, column, length };
};

/**
 * Location fields are optional everywhere; a present but malformed one is
 * still an error.
 */
const readOptionalLocation = (
  reader: Reader,
  value: unknown,
  at: string
): { readonly ok: boolean; readonly location?: SourceLocation } => {
  if (value === undefined) return { ok: true };
  const location = readLocation(reader, value, at);
  return { ok: location !== undefined, location };
};

/**
 * Type expressions: `["a", "b"]` is a method set, `"Name"` an alias;
 * objects use `methods`, `alias`, `class`, `allOf` or `anyOf`.
 */
const readType = (
  reader: Reader,
  value: unknown,
  at: string
): TypeExpression | undefined => {
  if (typeof value === "string") {
    const name = readString(reader, value, at, IDENTIFIER);
    return name === undefined ? undefined : { kind: "alias", name };
  }

  if (Array.isArray(value)) {
    const names = readArray(reader, value, at, (item, itemAt) =>
      readString(reader, item, itemAt, METHOD_NAME)
    );
    return names === undefined ? undefined : { kind: "methods", names };
  }

  if (!isObject(value)) {
    return invalid(reader, at, "a type (array, string or object)");
  }

  const keys = TYPE_KEYS.filter((key) => value[key] !== undefined);
  if (keys.length > 1) {
    return invalid(
      reader,
      at,
      `exactly one of 'methods', 'alias', 'class', 'allOf', 'anyOf', got ${keys.map((k) => `'${k}'`).join(", ")}`
    );
  }

  if (value.methods !== undefined) {
    if (!Array.isArray(value.methods)) {
      return invalid(reader, `${at}.methods`, "an array of method names");
    }
    return readType(reader, value.methods, `${at}.methods`);
  }
  if (value.alias !== undefined) {
    const name = readString(reader, value.alias, `${at}.alias`, IDENTIFIER);
    return name === undefined ? undefined : { kind: "alias", name };
  }
  if (value.class !== undefined) {
    const name = readString(reader, value.class, `${at}.class`, IDENTIFIER);
    return name === undefined ? undefined : { kind: "class", name };
  }
  if (value.allOf !== undefined) {
    const types = readArray(reader, value.allOf, `${at}.allOf`, (item, itemAt) =>
      readType(reader, item, itemAt)
    );
    return types === undefined ? undefined : { kind: "intersection", types };
  }
  if (value.anyOf !== undefined) {
    const types = readArray(reader, value.anyOf, `${at}.anyOf`, (item, itemAt) =>
      readType(reader, item, itemAt)
    );
    if (types === undefined) return undefined;
    const [first, ...rest] = types;
    if (first === undefined) {
      return invalid(reader, `${at}.anyOf`, "at least one type");
    }
    return { kind: "union", types: [first, ...rest] };
  }

  return invalid(reader, at, "one of 'methods', 'alias', 'class', 'allOf', 'anyOf'");
};

const readParameter = (
  reader: Reader,
  value: unknown,
  at: string
): ParameterDeclaration | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "a parameter object");
  }
  const name = readOptionalString(reader, value.name, `${at}.name`, IDENTIFIER);
  const type = readType(reader, value.type, `${at}.type`);
  if (type === undefined || (value.name !== undefined && name === undefined)) {
    return undefined;
  }
  return name === undefined ? { type } : { name, type };
};

const readMethod = (
  reader: Reader,
  value: unknown,
  at: string
): MethodSignature | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "a method object");
  }
  const name = readString(reader, value.name, `${at}.name`, METHOD_NAME);
  const parameters = readOptionalArray(
    reader,
    value.parameters,
    `${at}.parameters`,
    (item, itemAt) => readParameter(reader, item, itemAt)
  );
  const returnType =
    value.returns === undefined
      ? undefined
      : readType(reader, value.returns, `${at}.returns`);
  const location = readOptionalLocation(reader, value.location, `${at}.location`);

  if (
    name === undefined ||
    parameters === undefined ||
    (value.returns !== undefined && returnType === undefined) ||
    !location.ok
  ) {
    return undefined;
  }
  return { name, parameters, returnType, location: location.location };
};

const readAlias = (
  reader: Reader,
  value: unknown,
  at: string
): InterfaceAlias | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "an interface object");
  }
  const name = readString(reader, value.name, `${at}.name`, IDENTIFIER);
  const type = readType(reader, value.type, `${at}.type`);
  const location = readOptionalLocation(reader, value.location, `${at}.location`);
  if (name === undefined || type === undefined || !location.ok) {
    return undefined;
  }
  return { name, type, location: location.location };
};

/**
 * Class methods may be plain strings or `{ "name", "location" }` objects
 */
const readImplementation = (
  reader: Reader,
  value: unknown,
  at: string
): MethodImplementation | undefined => {
  if (typeof value === "string") {
    const name = readString(reader, value, at, METHOD_NAME);
    return name === undefined ? undefined : { name };
  }
  if (!isObject(value)) {
    return invalid(reader, at, "a method name or object");
  }
  const name = readString(reader, value.name, `${at}.name`, METHOD_NAME);
  const location = readOptionalLocation(reader, value.location, `${at}.location`);
  if (name === undefined || !location.ok) return undefined;
  return { name, location: location.location };
};

const readImport = (
  reader: Reader,
  value: unknown,
  at: string
): MethodImport | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "an import object");
  }
  const qualifiedName = readString(reader, value.method, `${at}.method`, METHOD_NAME);
  const alias = readOptionalString(reader, value.as, `${at}.as`, IDENTIFIER);
  const location = readOptionalLocation(reader, value.location, `${at}.location`);
  if (
    qualifiedName === undefined ||
    (value.as !== undefined && alias === undefined) ||
    !location.ok
  ) {
    return undefined;
  }
  return { qualifiedName, alias, location: location.location };
};

const readClass = (
  reader: Reader,
  value: unknown,
  at: string
): ClassDefinition | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "a class object");
  }
  const name = readString(reader, value.name, `${at}.name`, IDENTIFIER);
  const methods = readOptionalArray(reader, value.methods, `${at}.methods`, (item, itemAt) =>
    readImplementation(reader, item, itemAt)
  );
  const imports = readOptionalArray(reader, value.imports, `${at}.imports`, (item, itemAt) =>
    readImport(reader, item, itemAt)
  );
  const interfaces =
    value.implements === undefined
      ? undefined
      : readArray(reader, value.implements, `${at}.implements`, (item, itemAt) =>
          readType(reader, item, itemAt)
        );
  const location = readOptionalLocation(reader, value.location, `${at}.location`);

  if (
    name === undefined ||
    methods === undefined ||
    imports === undefined ||
    (value.implements !== undefined && interfaces === undefined) ||
    !location.ok
  ) {
    return undefined;
  }
  return { name, methods, imports, interfaces, location: location.location };
};

const readSite = (
  reader: Reader,
  value: unknown,
  at: string
): CheckSite | undefined => {
  if (!isObject(value)) {
    return invalid(reader, at, "a site object");
  }
  const location = readOptionalLocation(reader, value.location, `${at}.location`);

  switch (value.kind) {
    case "call": {
      const method = readString(reader, value.method, `${at}.method`, METHOD_NAME);
      const args = readOptionalArray(reader, value.arguments, `${at}.arguments`, (item, itemAt) =>
        readType(reader, item, itemAt)
      );
      if (method === undefined || args === undefined || !location.ok) return undefined;
      return { kind: "call", method, arguments: args, location: location.location };
    }
    case "return": {
      const method = readString(reader, value.method, `${at}.method`, METHOD_NAME);
      const returned = readType(reader, value.value, `${at}.value`);
      if (method === undefined || returned === undefined || !location.ok) return undefined;
      return { kind: "return", method, value: returned, location: location.location };
    }
    case "assignment": {
      const variable = readOptionalString(reader, value.variable, `${at}.variable`, IDENTIFIER);
      const declaredType = readType(reader, value.type, `${at}.type`);
      const assigned = readType(reader, value.value, `${at}.value`);
      if (
        declaredType === undefined ||
        assigned === undefined ||
        (value.variable !== undefined && variable === undefined) ||
        !location.ok
      ) {
        return undefined;
      }
      return {
        kind: "assignment",
        variable,
        declaredType,
        value: assigned,
        location: location.location,
      };
    }
    default:
      return invalid(reader, `${at}.kind`, "'call', 'return' or 'assignment'");
  }
};

/**
 * Validate parsed JSON as a program description
 */
export const parseProgram = (
  data: unknown,
  fileName: string
): Result<ProgramInput, readonly Diagnostic[]> => {
  if (!isObject(data)) {
    return error([
      errorAt(
        "MTH9004",
        `Program file must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
      ),
    ]);
  }

  const reader: Reader = { fileName, diagnostics: [] };
  const methods = readOptionalArray(reader, data.methods, "methods", (item, at) =>
    readMethod(reader, item, at)
  );
  const interfaces = readOptionalArray(reader, data.interfaces, "interfaces", (item, at) =>
    readAlias(reader, item, at)
  );
  const classes = readOptionalArray(reader, data.classes, "classes", (item, at) =>
    readClass(reader, item, at)
  );
  const sites = readOptionalArray(reader, data.sites, "sites", (item, at) =>
    readSite(reader, item, at)
  );

  if (
    reader.diagnostics.length > 0 ||
    methods === undefined ||
    interfaces === undefined ||
    classes === undefined ||
    sites === undefined
  ) {
    return error(reader.diagnostics);
  }

  return ok({ methods, interfaces, classes, sites });
};

/**
 * Load and validate a program file
 */
export const loadProgramFile = (
  filePath: string
): Result<ProgramInput, readonly Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return error([
      errorAt("MTH9001", `Program file not found: ${filePath}`),
    ]);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return error([
      errorAt(
        "MTH9002",
        `Failed to read program file: ${err instanceof Error ? err.message : String(err)}`
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return error([
      errorAt(
        "MTH9003",
        `Invalid JSON in program file: ${err instanceof Error ? err.message : String(err)}`
      ),
    ]);
  }

  return parseProgram(parsed, filePath);
};
