/**
 * Tests for diagnostic formatting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  dedupeDiagnostics,
  diagnosticName,
  errorAt,
  formatDiagnostic,
} from "./diagnostic.js";

const location = { file: "shapes.mt", line: 4, column: 2, length: 5 };

describe("Diagnostics", () => {
  it("should name the error kind of a code", () => {
    expect(diagnosticName("MTH3002")).to.equal("TypeMismatchError");
    expect(diagnosticName("MTH2002")).to.equal("AmbiguousMethodReferenceError");
  });

  it("should format location, code, message and hint", () => {
    const diagnostic = errorAt(
      "MTH1002",
      "Unknown method 'area'",
      location,
      "Declare the method first"
    );
    expect(formatDiagnostic(diagnostic)).to.equal(
      "shapes.mt:4:2 error MTH1002: Unknown method 'area' Hint: Declare the method first"
    );
  });

  it("should format a diagnostic without a location", () => {
    const diagnostic = createDiagnostic("MTH9004", "warning", "Not an object");
    expect(formatDiagnostic(diagnostic)).to.equal(
      "warning MTH9004: Not an object"
    );
  });

  it("should keep the first of repeated diagnostics", () => {
    const first = errorAt("MTH1004", "Unknown interface 'Shape'", location);
    const repeat = errorAt("MTH1004", "Unknown interface 'Shape'", location, "x");
    const elsewhere = errorAt("MTH1004", "Unknown interface 'Shape'");

    const result = dedupeDiagnostics([first, repeat, elsewhere]);
    expect(result).to.have.length(2);
    expect(result[0]).to.equal(first);
    expect(result[1]).to.equal(elsewhere);
  });
});
