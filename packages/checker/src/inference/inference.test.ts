/**
 * Tests for method reference resolution and method-set inference
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { ClassDefinition } from "../types/program.js";
import {
  createMethodRegistry,
  declareMethod,
  freezeRegistry,
  getDeclaredNames,
  type FrozenMethodRegistry,
} from "../registry/index.js";
import {
  resolveMethodReference,
  inferMethodSet,
  createInferenceEngine,
  createClassTable,
  defineClass,
  getClassType,
  getClassTypes,
} from "./index.js";

const registryOf = (...names: string[]): FrozenMethodRegistry =>
  freezeRegistry(
    names.reduce((registry, name) => {
      const result = declareMethod(registry, { name, parameters: [] });
      return result.ok ? result.value : registry;
    }, createMethodRegistry())
  );

const classOf = (name: string, ...methods: string[]): ClassDefinition => ({
  name,
  methods: methods.map((method) => ({ name: method })),
});

const streams = registryOf("isOpen", "close", "open");

describe("Method-set inference", () => {
  describe("resolveMethodReference", () => {
    const registry = registryOf("io.close", "db.close", "isOpen", "io.read");

    it("should resolve a declared name as written", () => {
      expect(resolveMethodReference(registry, [], "io.close")).to.deep.equal({
        ok: true,
        value: "io.close",
      });
    });

    it("should resolve an unqualified name with one declared match", () => {
      expect(resolveMethodReference(registry, [], "read")).to.deep.equal({
        ok: true,
        value: "io.read",
      });
    });

    it("should prefer an import over the registry-wide lookup", () => {
      const result = resolveMethodReference(
        registry,
        [{ qualifiedName: "db.close" }],
        "close"
      );
      expect(result).to.deep.equal({ ok: true, value: "db.close" });
    });

    it("should resolve through an import alias", () => {
      const result = resolveMethodReference(
        registry,
        [{ qualifiedName: "io.close", alias: "shut" }],
        "shut"
      );
      expect(result).to.deep.equal({ ok: true, value: "io.close" });
    });

    it("should report two imports sharing an unqualified name", () => {
      const result = resolveMethodReference(
        registry,
        [{ qualifiedName: "io.close" }, { qualifiedName: "db.close" }],
        "close"
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MTH2002");
        expect(result.error.message).to.equal(
          "Method reference 'close' is ambiguous: 'io.close', 'db.close'"
        );
      }
    });

    it("should report an ambiguous registry-wide lookup", () => {
      const result = resolveMethodReference(registry, [], "close");
      expect(!result.ok && result.error.code).to.equal("MTH2002");
    });

    it("should not count the same import twice as ambiguity", () => {
      const result = resolveMethodReference(
        registry,
        [{ qualifiedName: "io.close" }, { qualifiedName: "io.close" }],
        "close"
      );
      expect(result).to.deep.equal({ ok: true, value: "io.close" });
    });

    it("should reject an undeclared qualified name", () => {
      const result = resolveMethodReference(registry, [], "net.close");
      expect(!result.ok && result.error.message).to.equal(
        "Method 'net.close' is not declared"
      );
    });
  });

  describe("inferMethodSet", () => {
    it("should infer exactly the implemented declared methods", () => {
      const result = inferMethodSet(
        streams,
        classOf("SingleUseStream", "isOpen", "close")
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.names).to.deep.equal(["close", "isOpen"]);
        expect(result.value.label).to.equal("SingleUseStream");
      }
    });

    it("should infer all three methods for a reusable stream", () => {
      const result = inferMethodSet(
        streams,
        classOf("MultiUseStream", "isOpen", "close", "open")
      );
      expect(result.ok && result.value.names).to.deep.equal([
        "close",
        "isOpen",
        "open",
      ]);
    });

    it("should reject a method absent from the registry", () => {
      const result = inferMethodSet(
        streams,
        classOf("Bird", "isOpen", "fly")
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal(["MTH2001"]);
        expect(result.error[0]?.message).to.equal(
          "Method 'fly' is not declared"
        );
      }
    });

    it("should report every bad reference in one class", () => {
      const result = inferMethodSet(
        streams,
        classOf("Bird", "fly", "swim", "close")
      );
      expect(!result.ok && result.error.length).to.equal(2);
    });

    it("should add imported implementations to the set", () => {
      const registry = registryOf("io.close", "isOpen");
      const result = inferMethodSet(registry, {
        name: "FileHandle",
        methods: [{ name: "isOpen" }],
        imports: [{ qualifiedName: "io.close" }],
      });
      expect(result.ok && result.value.names).to.deep.equal([
        "io.close",
        "isOpen",
      ]);
    });

    it("should reject an import of an undeclared method", () => {
      const result = inferMethodSet(streams, {
        name: "FileHandle",
        methods: [],
        imports: [{ qualifiedName: "io.flush" }],
      });
      expect(!result.ok && result.error[0]?.message).to.equal(
        "Class 'FileHandle' imports undeclared method 'io.flush'"
      );
    });

    it("should never infer a name outside the registry", () => {
      const registry = registryOf("io.close", "db.close", "isOpen", "open");
      const definitions: ClassDefinition[] = [
        classOf("A", "isOpen"),
        classOf("B", "open", "isOpen", "io.close"),
        { name: "C", methods: [{ name: "close" }], imports: [{ qualifiedName: "db.close" }] },
      ];
      const universe = new Set(getDeclaredNames(registry));

      for (const definition of definitions) {
        const result = inferMethodSet(registry, definition);
        expect(result.ok).to.equal(true);
        if (result.ok) {
          for (const name of result.value.names) {
            expect(universe.has(name)).to.equal(true);
          }
        }
      }
    });
  });

  describe("createInferenceEngine", () => {
    it("should give set-equal results on repeated inference", () => {
      const engine = createInferenceEngine(streams);
      const definition = classOf("SingleUseStream", "isOpen", "close");

      const first = engine.infer(definition);
      const second = engine.infer(definition);

      expect(second).to.equal(first);
      expect(first.ok && second.ok && first.value.key === second.value.key).to.equal(true);
    });

    it("should re-infer a changed class body", () => {
      const engine = createInferenceEngine(streams);
      const before = engine.infer(classOf("Stream", "isOpen", "close"));
      const after = engine.infer(classOf("Stream", "isOpen", "close", "open"));

      expect(before.ok && before.value.names).to.deep.equal(["close", "isOpen"]);
      expect(after.ok && after.value.names).to.deep.equal([
        "close",
        "isOpen",
        "open",
      ]);
    });
  });

  describe("class table", () => {
    it("should store the inferred set against the class", () => {
      const engine = createInferenceEngine(streams);
      const result = defineClass(
        createClassTable(),
        engine,
        classOf("SingleUseStream", "isOpen", "close")
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(getClassType(result.value, "SingleUseStream")?.names).to.deep.equal([
          "close",
          "isOpen",
        ]);
      }
    });

    it("should reject an undeclared method at definition time", () => {
      const engine = createInferenceEngine(streams);
      const result = defineClass(createClassTable(), engine, classOf("Bird", "fly"));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("MTH2001");
      }
    });

    it("should replace the inferred set when a class is redefined", () => {
      const engine = createInferenceEngine(streams);
      const first = defineClass(createClassTable(), engine, classOf("Stream", "close"));
      if (!first.ok) throw new Error("first definition failed");

      const second = defineClass(first.value, engine, classOf("Stream", "close", "open"));
      if (!second.ok) throw new Error("second definition failed");

      expect(getClassType(first.value, "Stream")?.names).to.deep.equal(["close"]);
      expect(getClassType(second.value, "Stream")?.names).to.deep.equal([
        "close",
        "open",
      ]);
      expect([...getClassTypes(second.value).keys()]).to.deep.equal(["Stream"]);
    });
  });
});
