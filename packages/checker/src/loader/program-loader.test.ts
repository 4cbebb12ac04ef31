/**
 * Tests for the program loader
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { loadProgramFile, parseProgram } from "./program-loader.js";

describe("Program loader", () => {
  describe("parseProgram", () => {
    it("should read every section with shorthand types", () => {
      const result = parseProgram(
        {
          methods: [
            { name: "isOpen" },
            { name: "close" },
            {
              name: "finish",
              parameters: [{ name: "stream", type: ["isOpen", "close"] }],
              returns: "Closeable",
              location: { line: 3, column: 1 },
            },
          ],
          interfaces: [{ name: "Closeable", type: { allOf: [["close"], ["isOpen"]] } }],
          classes: [
            {
              name: "FileHandle",
              methods: ["isOpen", { name: "shut", location: { line: 9, column: 5, length: 4 } }],
              imports: [{ method: "io.close", as: "shut" }],
              implements: ["Closeable"],
            },
          ],
          sites: [
            { kind: "call", method: "finish", arguments: [{ class: "FileHandle" }] },
            { kind: "return", method: "finish", value: { anyOf: [["close"], { class: "FileHandle" }] } },
            { kind: "assignment", variable: "h", type: "Closeable", value: { methods: ["close"] } },
          ],
        },
        "/work/streams.json"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const program = result.value;

      expect(program.methods.map((m) => m.name)).to.deep.equal([
        "isOpen",
        "close",
        "finish",
      ]);
      expect(program.methods[2]?.parameters).to.deep.equal([
        { name: "stream", type: { kind: "methods", names: ["isOpen", "close"] } },
      ]);
      expect(program.methods[2]?.returnType).to.deep.equal({
        kind: "alias",
        name: "Closeable",
      });
      expect(program.methods[2]?.location).to.deep.equal({
        file: "/work/streams.json",
        line: 3,
        column: 1,
        length: 0,
      });

      expect(program.interfaces[0]?.type).to.deep.equal({
        kind: "intersection",
        types: [
          { kind: "methods", names: ["close"] },
          { kind: "methods", names: ["isOpen"] },
        ],
      });

      const handle = program.classes[0];
      expect(handle?.methods.map((m) => m.name)).to.deep.equal(["isOpen", "shut"]);
      expect(handle?.methods[1]?.location?.line).to.equal(9);
      expect(handle?.imports).to.deep.equal([
        { qualifiedName: "io.close", alias: "shut", location: undefined },
      ]);
      expect(handle?.interfaces).to.deep.equal([{ kind: "alias", name: "Closeable" }]);

      expect(program.sites.map((s) => s.kind)).to.deep.equal([
        "call",
        "return",
        "assignment",
      ]);
      const returned = program.sites[1];
      expect(returned?.kind === "return" && returned.value).to.deep.equal({
        kind: "union",
        types: [
          { kind: "methods", names: ["close"] },
          { kind: "class", name: "FileHandle" },
        ],
      });
    });

    it("should default missing sections to empty lists", () => {
      const result = parseProgram({}, "empty.json");
      expect(result).to.deep.equal({
        ok: true,
        value: { methods: [], interfaces: [], classes: [], sites: [] },
      });
    });

    it("should reject a non-object document", () => {
      const result = parseProgram([1, 2], "list.json");
      expect(!result.ok && result.error[0]?.code).to.equal("MTH9004");
      expect(!result.ok && result.error[0]?.message).to.equal(
        "Program file must be an object, got array"
      );
    });

    it("should report each invalid field with its path", () => {
      const result = parseProgram(
        {
          methods: [{ name: "not a name" }, { name: "ok", parameters: [{ type: 42 }] }],
          sites: [{ kind: "jump" }],
        },
        "/work/bad.json"
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal([
          "MTH9005",
          "MTH9005",
          "MTH9005",
        ]);
        expect(result.error.map((d) => d.message)).to.deep.equal([
          "Invalid methods[0].name in bad.json: expected a valid name",
          "Invalid methods[1].parameters[0].type in bad.json: expected a type (array, string or object)",
          "Invalid sites[0].kind in bad.json: expected 'call', 'return' or 'assignment'",
        ]);
      }
    });

    it("should reject an empty union", () => {
      const result = parseProgram(
        { interfaces: [{ name: "Nothing", type: { anyOf: [] } }] },
        "u.json"
      );
      expect(!result.ok && result.error[0]?.message).to.equal(
        "Invalid interfaces[0].type.anyOf in u.json: expected at least one type"
      );
    });

    it("should reject a type object with more than one type key", () => {
      const result = parseProgram(
        {
          interfaces: [
            { name: "Mixed", type: { methods: ["close"], alias: "Closeable" } },
          ],
        },
        "t.json"
      );
      expect(!result.ok && result.error.map((d) => d.message)).to.deep.equal([
        "Invalid interfaces[0].type in t.json: expected exactly one of 'methods', 'alias', 'class', 'allOf', 'anyOf', got 'methods', 'alias'",
      ]);
    });

    it("should require an array under 'methods'", () => {
      const result = parseProgram(
        { interfaces: [{ name: "Named", type: { methods: "Closeable" } }] },
        "t.json"
      );
      expect(!result.ok && result.error.map((d) => d.message)).to.deep.equal([
        "Invalid interfaces[0].type.methods in t.json: expected an array of method names",
      ]);
    });
  });

  describe("loadProgramFile", () => {
    let tmpDir = "";

    before(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "methodical-loader-"));
    });

    after(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const missing = path.join(tmpDir, "missing.json");
      const result = loadProgramFile(missing);
      expect(!result.ok && result.error[0]?.code).to.equal("MTH9001");
      expect(!result.ok && result.error[0]?.message).to.equal(
        `Program file not found: ${missing}`
      );
    });

    it("should report invalid JSON", () => {
      const filePath = path.join(tmpDir, "broken.json");
      fs.writeFileSync(filePath, "{ methods: ");
      const result = loadProgramFile(filePath);
      expect(!result.ok && result.error[0]?.code).to.equal("MTH9003");
    });

    it("should load a valid program", () => {
      const filePath = path.join(tmpDir, "streams.json");
      fs.writeFileSync(
        filePath,
        JSON.stringify({
          methods: [{ name: "close" }],
          classes: [{ name: "Stream", methods: ["close"] }],
        })
      );
      const result = loadProgramFile(filePath);

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.classes[0]?.name).to.equal("Stream");
      }
    });
  });
});
