/**
 * Tests for phase outcome collection.
 *
 * Run: node --import tsx --test src/build/outcome.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { AggregateBuildError, BuildError, IOError } from "../errors.js";
import {
  collectOutcomes,
  failure,
  mergeOutcome,
  nothing,
  success,
  type Outcome,
} from "./outcome.js";

const fail = (message: string) => failure(new BuildError(message));

function messageOf<T>(outcome: Outcome<T>): string {
  assert.equal(outcome.ok, false);
  return outcome.ok ? "" : outcome.error.message;
}

describe("mergeOutcome", () => {
  it("appends a success value to the accumulated list", () => {
    const merged = mergeOutcome(success(["a"]), success("b"));
    assert.deepEqual(merged, success(["a", "b"]));
  });

  it("leaves the accumulator alone for a success without a value", () => {
    const acc = success(["a"]);
    assert.equal(mergeOutcome(acc, nothing<string>()), acc);
  });

  it("lets a failure replace a successful accumulator", () => {
    const next = fail("A");
    assert.equal(mergeOutcome(success(["a"]), next), next);
  });

  it("keeps a failure when a success follows", () => {
    const acc = fail("A");
    assert.equal(mergeOutcome(acc, success("b")), acc);
  });

  it("joins two failures with a comma", () => {
    const merged = mergeOutcome<string>(fail("A"), fail("B"));
    assert.equal(messageOf(merged), "A, B");
  });

  it("joins two failures even when their messages are identical", () => {
    const merged = mergeOutcome<string>(fail("same"), fail("same"));
    assert.equal(messageOf(merged), "same, same");
  });
});

describe("collectOutcomes", () => {
  it("collects values in input order and skips empty successes", () => {
    const outcomes: Outcome<number>[] = [
      success(1),
      nothing(),
      success(2),
      success(3),
    ];
    assert.deepEqual(collectOutcomes(outcomes), success([1, 2, 3]));
  });

  it("collects an empty phase to an empty list", () => {
    assert.deepEqual(collectOutcomes([]), success([]));
  });

  it("collects all-empty successes to an empty list", () => {
    assert.deepEqual(collectOutcomes([nothing(), nothing()]), success([]));
  });

  it("reports every failure in fold order", () => {
    const outcomes: Outcome<string>[] = [
      success("x"),
      fail("A"),
      success("y"),
      fail("B"),
    ];
    assert.equal(messageOf(collectOutcomes(outcomes)), "A, B");
  });

  it("keeps a single failure as-is", () => {
    const error = new IOError("write", "/out/a.html", { code: "EACCES" });
    const collected = collectOutcomes<string>([success("x"), failure(error)]);
    assert.equal(collected.ok, false);
    assert.equal(collected.ok ? undefined : collected.error, error);
  });

  it("flattens three failures into one aggregate", () => {
    const collected = collectOutcomes<string>([fail("A"), fail("B"), fail("C")]);
    assert.equal(collected.ok, false);
    if (collected.ok) return;
    assert.ok(collected.error instanceof AggregateBuildError);
    assert.equal(collected.error.message, "A, B, C");
    assert.deepEqual(
      collected.error.errors.map((error) => error.message),
      ["A", "B", "C"]
    );
  });

  it("gives the same result for any grouping that keeps order", () => {
    const outcomes: Outcome<string>[] = [
      fail("A"),
      success("x"),
      fail("B"),
      fail("C"),
    ];
    const whole = collectOutcomes(outcomes);

    const left = collectOutcomes(outcomes.slice(0, 2));
    const right = collectOutcomes(outcomes.slice(2));
    const grouped =
      left.ok || right.ok
        ? left.ok ? right : left
        : failure(new AggregateBuildError([left.error, right.error]));

    assert.equal(whole.ok, grouped.ok);
    assert.equal(messageOf(whole), messageOf(grouped));
  });
});
