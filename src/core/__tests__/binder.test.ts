import { describe, it, expect } from "vitest";
import { createArgumentBinder } from "../binder.js";
import { createCoercionRegistry } from "../coercion.js";
import { CoercionError } from "../errors.js";
import type { DispatchResult } from "../../types.js";
import { meaning, moveVocabulary, phrase } from "./helpers.js";

function makeBinder() {
  return createArgumentBinder({
    vocabulary: moveVocabulary(),
    coercion: createCoercionRegistry(),
  });
}

function bound(outcome: ReturnType<ReturnType<typeof makeBinder>["bind"]>): DispatchResult {
  if (outcome.kind !== "bound") throw new Error(`expected a bound result, got ${outcome.reason}`);
  return outcome.result;
}

describe("ArgumentBinder", () => {
  it("binds direction and distance in precedence order", () => {
    const result = bound(
      makeBinder().bind(
        phrase(meaning("distance", "2.5"), meaning("action", "move"), meaning("direction", "left"))
      )
    );

    expect(result.action.triggerKeyword).toBe("move");
    expect(result.arity).toBe("multiple");
    expect(result.positional).toEqual(["left", 2.5]);
    expect(result.signature).toEqual(["string", "float"]);
  });

  it("produces a zero-argument result when no secondary keys are recognized", () => {
    const result = bound(makeBinder().bind(phrase(meaning("action", "stop"))));
    expect(result.arity).toBe("none");
    expect(result.positional).toEqual([]);
    expect(result.arguments.size).toBe(0);
  });

  it("passes a single argument directly, ignoring precedence", () => {
    const result = bound(makeBinder().bind(phrase(meaning("action", "go"), meaning("weight", "7"))));
    expect(result.arity).toBe("single");
    expect(result.positional).toEqual([7]);
    expect(result.signature).toEqual(["int32"]);
  });

  it("uses only the first value of a scalar argument", () => {
    const binder = makeBinder();
    const first = bound(binder.bind(phrase(meaning("action", "go"), meaning("weight", "3", "9", "12"))));
    const reordered = bound(binder.bind(phrase(meaning("action", "go"), meaning("weight", "3", "12", "9"))));
    expect(first.positional).toEqual([3]);
    expect(reordered.positional).toEqual(first.positional);
  });

  it("keeps every value of a collection argument in recognizer order", () => {
    const result = bound(
      makeBinder().bind(phrase(meaning("action", "go"), meaning("steps", "3", "1", "2")))
    );
    expect(result.positional).toEqual([[3, 1, 2]]);
    expect(result.signature).toEqual(["int32[]"]);
  });

  it("skips precedence keys the event does not supply", () => {
    const result = bound(
      makeBinder().bind(
        phrase(meaning("action", "tag"), meaning("direction", "up"), meaning("weight", "4"))
      )
    );
    expect(result.positional).toEqual([4, "up"]);
    expect(result.signature).toEqual(["int32", "string"]);
  });

  it("drops bound arguments the action's precedence does not name", () => {
    const result = bound(
      makeBinder().bind(
        phrase(meaning("action", "move"), meaning("direction", "up"), meaning("weight", "4"))
      )
    );
    expect(result.arguments.size).toBe(2);
    expect(result.positional).toEqual(["up"]);
  });

  it("ignores meanings without an argument spec", () => {
    const result = bound(
      makeBinder().bind(
        phrase(meaning("action", "move"), meaning("direction", "left"), meaning("mood", "happy"))
      )
    );
    expect(result.arguments.size).toBe(1);
    expect([...result.arguments.keys()]).toEqual(["direction"]);
  });

  it("lets the first primary meaning win", () => {
    const binder = makeBinder();
    const scan = binder.scan(phrase(meaning("action", "stop"), meaning("action", "go")));
    expect(scan.triggerKeyword).toBe("stop");
    expect(bound(binder.bind(phrase(meaning("action", "stop"), meaning("action", "go")))).action.triggerKeyword).toBe("stop");
  });

  it("skips a primary meaning with no values", () => {
    const scan = makeBinder().scan(phrase(meaning("action"), meaning("action", "go")));
    expect(scan.triggerKeyword).toBe("go");
  });

  it("keeps the last duplicate argument meaning", () => {
    const result = bound(
      makeBinder().bind(
        phrase(meaning("action", "go"), meaning("weight", "1"), meaning("weight", "2"))
      )
    );
    expect(result.positional).toEqual([2]);
  });

  it("reports why no action fired", () => {
    const binder = makeBinder();
    expect(binder.bind(phrase(meaning("direction", "left")))).toEqual({
      kind: "no-action",
      reason: "no-primary-key",
    });
    expect(binder.bind(phrase(meaning("action", "")))).toEqual({
      kind: "no-action",
      reason: "empty-trigger",
      triggerKeyword: "",
    });
    expect(binder.bind(phrase(meaning("action", "fly")))).toEqual({
      kind: "no-action",
      reason: "unknown-action",
      triggerKeyword: "fly",
    });
  });

  it("raises CoercionError naming the key when a value does not parse", () => {
    const binder = makeBinder();
    const event = phrase(meaning("action", "move"), meaning("direction", "left"), meaning("distance", "far"));
    expect(() => binder.bind(event)).toThrow(CoercionError);
    expect(() => binder.bind(event)).toThrow('Cannot read "far" as float for "distance": not a number');
  });

  it("treats a scalar meaning with no values as a coercion failure", () => {
    const binder = makeBinder();
    expect(() => binder.bind(phrase(meaning("action", "go"), meaning("weight")))).toThrow(
      'Cannot read missing value as int32 for "weight": no value recognized'
    );
  });

  it("does not coerce arguments of an unknown action", () => {
    expect(makeBinder().bind(phrase(meaning("action", "fly"), meaning("distance", "far"))).kind).toBe(
      "no-action"
    );
  });
});
