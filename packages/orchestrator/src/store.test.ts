import { DuplicateStageError, type Item, StageCycleError, createItem } from "@importline/core";
import { RecordingStage } from "@importline/pipeline/testing";
import { describe, expect, test } from "vitest";
import { ItemStore } from "./store";

describe("ItemStore", () => {
  test("returns a pipeline for a new item and null for a duplicate", () => {
    const store = new ItemStore<Item>({ stages: [] });

    const first = store.register(createItem({ key: "steam_1", name: "A" }), {});
    const second = store.register(createItem({ key: "steam_1", name: "A again" }), {});

    expect(first).not.toBeNull();
    expect(second).toBeNull();
    expect(store.size).toBe(1);
    expect(store.get("steam_1")?.name).toBe("A");
  });

  test("marks excluded and removed items", () => {
    const store = new ItemStore<Item>({ stages: [], excludedKeys: ["x"], removedKeys: ["r"] });
    const excluded = createItem({ key: "x", name: "X" });
    const removed = createItem({ key: "r", name: "R" });

    store.register(excluded, {});
    store.register(removed, {});

    expect(excluded).toMatchObject({ excluded: true, removed: false });
    expect(removed).toMatchObject({ excluded: false, removed: true });
  });

  test("builds pipelines from the stages that apply to the item", () => {
    const store = new ItemStore({
      stages: [
        new RecordingStage("display", []),
        new RecordingStage("steam-api", [], { appliesTo: (item) => item.key.startsWith("steam_") }),
      ],
    });

    const steam = store.register(createItem({ key: "steam_1", name: "A" }), {});
    const gog = store.register(createItem({ key: "gog_1", name: "B" }), {});

    expect(steam?.stages.map((s) => s.key)).toEqual(["display", "steam-api"]);
    expect(gog?.stages.map((s) => s.key)).toEqual(["display"]);
  });

  test("does not store an item whose pipeline has a cycle", () => {
    const store = new ItemStore({
      stages: [
        new RecordingStage("a", [], { runAfter: ["b"] }),
        new RecordingStage("b", [], { runAfter: ["a"] }),
      ],
    });

    expect(() => store.register(createItem({ key: "k", name: "K" }), {})).toThrow(StageCycleError);
    expect(store.size).toBe(0);
  });

  test("leaves a rejected item unmarked", () => {
    const store = new ItemStore({
      stages: [
        new RecordingStage("a", [], { runAfter: ["b"] }),
        new RecordingStage("b", [], { runAfter: ["a"] }),
      ],
      excludedKeys: ["k"],
      removedKeys: ["k"],
    });
    const item = createItem({ key: "k", name: "K" });

    expect(() => store.register(item, {})).toThrow(StageCycleError);
    expect(item).toMatchObject({ excluded: false, removed: false });
  });

  test("rejects duplicate stage keys up front", () => {
    expect(
      () => new ItemStore({ stages: [new RecordingStage("a", []), new RecordingStage("a", [])] })
    ).toThrow(DuplicateStageError);
  });

  test("collects errors from every stage", async () => {
    const failing = new RecordingStage("metadata", [], { fail: () => true });
    const store = new ItemStore({ stages: [new RecordingStage("display", []), failing] });

    const pipeline = store.register(createItem({ key: "k", name: "K" }), {});
    await pipeline?.run();

    expect(store.collectErrors().map((e) => `${e.stage}/${e.item}`)).toEqual(["metadata/k"]);
    expect(store.collectErrors()).toEqual([]);
  });
});
