/**
 * Tests for Result helpers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, collectResults, unwrapOr } from "./result.js";

describe("Result", () => {
  describe("map and flatMap", () => {
    it("should map an ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass an error through map untouched", () => {
      const mapped = map(error<number, string>("bad"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "bad" });
    });

    it("should stop at the first failing step of flatMap", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        x > 10 ? ok(x) : error("too small")
      );
      expect(mapped).to.deep.equal({ ok: false, error: "too small" });
    });
  });

  describe("collectResults", () => {
    it("should gather every value when all results are ok", () => {
      const combined = collectResults<number, string>([ok(1), ok(2), ok(3)]);
      expect(combined).to.deep.equal({ ok: true, value: [1, 2, 3] });
    });

    it("should keep every error in input order", () => {
      const combined = collectResults<number, string>([
        error(["first"]),
        ok(2),
        error(["second", "third"]),
      ]);
      expect(combined).to.deep.equal({
        ok: false,
        error: ["first", "second", "third"],
      });
    });

    it("should treat an empty list as ok", () => {
      expect(collectResults<number, string>([])).to.deep.equal({
        ok: true,
        value: [],
      });
    });
  });

  describe("unwrapOr", () => {
    it("should fall back to the default on error", () => {
      expect(unwrapOr(error<number, string>("bad"), 0)).to.equal(0);
      expect(unwrapOr(ok<number, string>(7), 0)).to.equal(7);
    });
  });
});
