/**
 * Tests for type evaluation and interface aliases
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createMethodSetType, methodSetsEqual } from "../types/method-set.js";
import type { InterfaceAlias } from "../types/program.js";
import {
  aliasType,
  classType,
  intersectionOf,
  methodsType,
  unionOf,
} from "../types/type-expression.js";
import {
  createMethodRegistry,
  declareMethod,
  freezeRegistry,
  type FrozenMethodRegistry,
} from "../registry/index.js";
import {
  createAliasTable,
  defineAlias,
  type AliasTable,
} from "./aliases.js";
import { createTypeEvaluator, validateAliases } from "./evaluate.js";

const registryOf = (...names: string[]): FrozenMethodRegistry =>
  freezeRegistry(
    names.reduce((registry, name) => {
      const result = declareMethod(registry, { name, parameters: [] });
      return result.ok ? result.value : registry;
    }, createMethodRegistry())
  );

const aliasesOf = (...aliases: InterfaceAlias[]): AliasTable =>
  aliases.reduce((table, alias) => {
    const result = defineAlias(table, alias);
    return result.ok ? result.value : table;
  }, createAliasTable());

const registry = registryOf("isOpen", "close", "open", "read");

describe("Type evaluation", () => {
  describe("method sets", () => {
    it("should build a set from declared names", () => {
      const evaluator = createTypeEvaluator({
        registry,
        aliases: createAliasTable(),
      });
      const result = evaluator.evaluate(methodsType("close", "isOpen", "close"));

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.names).to.deep.equal(["close", "isOpen"]);
      }
    });

    it("should reject undeclared names", () => {
      const evaluator = createTypeEvaluator({
        registry,
        aliases: createAliasTable(),
      });
      const result = evaluator.evaluate(methodsType("fly", "close", "swim"));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal([
          "MTH2001",
          "MTH2001",
        ]);
        expect(result.error[0]?.message).to.equal(
          "Type requires undeclared method 'fly'"
        );
      }
    });
  });

  describe("composition", () => {
    const evaluator = createTypeEvaluator({
      registry,
      aliases: createAliasTable(),
    });

    it("should union names for an intersection", () => {
      const result = evaluator.evaluate(
        intersectionOf(methodsType("close"), methodsType("isOpen"))
      );
      expect(result.ok && result.value.names).to.deep.equal([
        "close",
        "isOpen",
      ]);
    });

    it("should intersect names for a union", () => {
      const result = evaluator.evaluate(
        unionOf(methodsType("close", "isOpen"), methodsType("close", "open"))
      );
      expect(result.ok && result.value.names).to.deep.equal(["close"]);
    });

    it("should collect errors from every operand", () => {
      const result = evaluator.evaluate(
        intersectionOf(methodsType("fly"), aliasType("Missing"))
      );
      expect(!result.ok && result.error.map((d) => d.code)).to.deep.equal([
        "MTH2001",
        "MTH1004",
      ]);
    });
  });

  describe("aliases", () => {
    it("should resolve to exactly the underlying set", () => {
      const aliases = aliasesOf({
        name: "Closeable",
        type: methodsType("close", "isOpen"),
      });
      const evaluator = createTypeEvaluator({ registry, aliases });
      const resolved = evaluator.resolveAlias("Closeable");

      expect(resolved.ok).to.equal(true);
      if (resolved.ok) {
        expect(
          methodSetsEqual(
            resolved.value,
            createMethodSetType(["isOpen", "close"])
          )
        ).to.equal(true);
        expect(resolved.value.label).to.equal("Closeable");
      }
    });

    it("should resolve aliases of aliases", () => {
      const aliases = aliasesOf(
        { name: "Closeable", type: methodsType("close") },
        {
          name: "Reusable",
          type: intersectionOf(aliasType("Closeable"), methodsType("open")),
        }
      );
      const evaluator = createTypeEvaluator({ registry, aliases });
      const resolved = evaluator.evaluate(aliasType("Reusable"));

      expect(resolved.ok && resolved.value.names).to.deep.equal([
        "close",
        "open",
      ]);
    });

    it("should detect cycles", () => {
      const aliases = aliasesOf(
        { name: "A", type: aliasType("B") },
        { name: "B", type: intersectionOf(aliasType("A"), methodsType("read")) }
      );
      const evaluator = createTypeEvaluator({ registry, aliases });
      const resolved = evaluator.resolveAlias("A");

      expect(resolved.ok).to.equal(false);
      if (!resolved.ok) {
        expect(resolved.error[0]?.code).to.equal("MTH1005");
        expect(resolved.error[0]?.message).to.equal(
          "Interface 'A' refers to itself: A -> B -> A"
        );
      }
    });

    it("should refuse class references before inference", () => {
      const aliases = aliasesOf({ name: "Like", type: classType("Stream") });
      const evaluator = createTypeEvaluator({ registry, aliases });

      const diagnostics = validateAliases(evaluator, aliases);
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["MTH1006"]);
    });

    it("should report a broken alias once even when others use it", () => {
      const aliases = aliasesOf(
        { name: "Broken", type: methodsType("fly") },
        { name: "User", type: aliasType("Broken") }
      );
      const evaluator = createTypeEvaluator({ registry, aliases });

      const diagnostics = validateAliases(evaluator, aliases);
      expect(diagnostics.map((d) => d.message)).to.deep.equal([
        "Type requires undeclared method 'fly'",
      ]);
    });

    it("should accept an identical redefinition and reject a different one", () => {
      const table = aliasesOf({ name: "Closeable", type: methodsType("close") });

      const same = defineAlias(table, {
        name: "Closeable",
        type: methodsType("close"),
      });
      expect(same.ok && same.value).to.equal(table);

      const different = defineAlias(table, {
        name: "Closeable",
        type: methodsType("close", "isOpen"),
      });
      expect(!different.ok && different.error.code).to.equal("MTH1003");
    });
  });

  describe("class types", () => {
    it("should use inferred class sets once available", () => {
      const evaluator = createTypeEvaluator({
        registry,
        aliases: createAliasTable(),
        classTypes: new Map([
          ["SingleUseStream", createMethodSetType(["isOpen", "close"], "SingleUseStream")],
        ]),
      });

      const known = evaluator.evaluate(classType("SingleUseStream"));
      expect(known.ok && known.value.names).to.deep.equal(["close", "isOpen"]);

      const unknown = evaluator.evaluate(classType("Nope"));
      expect(!unknown.ok && unknown.error[0]?.code).to.equal("MTH2004");
    });
  });
});
