import { DuplicateStageError, StageCycleError } from "@importline/core";
import { describe, expect, test } from "vitest";
import { resolveStageOrder } from "./ordering";

function stage(key: string, runAfter: string[] = []) {
  return { key, runAfter };
}

function keys(stages: { key: string }[]): string[] {
  return stages.map((s) => s.key);
}

describe("resolveStageOrder", () => {
  test("places prerequisites before dependents", () => {
    const order = resolveStageOrder([
      stage("cover", ["metadata"]),
      stage("metadata", ["display"]),
      stage("display"),
    ]);

    expect(keys(order)).toEqual(["display", "metadata", "cover"]);
  });

  test("keeps declaration order for unconstrained stages", () => {
    const order = resolveStageOrder([stage("b"), stage("a"), stage("c", ["a"])]);

    expect(keys(order)).toEqual(["b", "a", "c"]);
  });

  test("ignores prerequisites that are not in the set", () => {
    const order = resolveStageOrder([stage("cover", ["steam-api"]), stage("display")]);

    expect(keys(order)).toEqual(["cover", "display"]);
  });

  test("returns an empty order for no stages", () => {
    expect(resolveStageOrder([])).toEqual([]);
  });

  test("rejects a two-stage cycle naming both stages", () => {
    const attempt = () => resolveStageOrder([stage("a", ["b"]), stage("b", ["a"]), stage("c")]);

    expect(attempt).toThrow(StageCycleError);
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(StageCycleError);
      if (error instanceof StageCycleError) expect(error.stages).toEqual(["a", "b"]);
    }
  });

  test("rejects a stage that runs after itself", () => {
    expect(() => resolveStageOrder([stage("a", ["a"])])).toThrow(StageCycleError);
  });

  test("rejects duplicate keys", () => {
    expect(() => resolveStageOrder([stage("a"), stage("a")])).toThrow(DuplicateStageError);
  });
});
