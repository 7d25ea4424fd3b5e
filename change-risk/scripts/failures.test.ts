import assert from "node:assert/strict";
import test from "node:test";
import { GraphUnavailableError, ReasoningMalformedResponseError, ValidatorWriteError } from "./errors";
import { classifyFailure, emptyFailTaxonomy } from "./failures";

test("classifyFailure uses the error kind of named errors", () => {
  assert.equal(classifyFailure(new GraphUnavailableError("neighbors", "timeout")).kind, "GRAPH_UNAVAILABLE");
  assert.equal(classifyFailure(new ReasoningMalformedResponseError("decide", "bad json")).kind, "REASONING_MALFORMED");
  const write = classifyFailure(new ValidatorWriteError("coupling", { cause: new Error("EACCES") }));
  assert.equal(write.kind, "VALIDATOR_WRITE_FAILED");
  assert.equal(write.message, "failed to persist feedback for coupling: EACCES");
  assert.deepEqual(write.hints, ["Check validation.storePath is writable"]);
});

test("classifyFailure infers kinds from plain errors", () => {
  assert.equal(classifyFailure(new Error("This operation was aborted")).kind, "CANCELLED");
  assert.equal(classifyFailure(new Error("request timed out")).kind, "REASONING_TIMEOUT");
  const unknown = classifyFailure("boom");
  assert.deepEqual(unknown, { kind: "UNKNOWN", message: "boom", hints: ["Inspect run events for details"] });
});

test("emptyFailTaxonomy starts every kind at zero", () => {
  assert.deepEqual(Object.values(emptyFailTaxonomy()), [0, 0, 0, 0, 0, 0]);
});
