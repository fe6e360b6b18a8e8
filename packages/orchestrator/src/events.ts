import type { Item } from "@importline/core";
import type { Pipeline } from "@importline/pipeline";

/**
 * Every state change of an import run, in the order the coordinator applies them.
 * `done` is captured when the event is pushed; the pipeline may have moved on by
 * the time the coordinator reads it.
 */
export type ImportEvent<T extends Item = Item> =
  | { type: "source:started"; sourceId: string }
  | { type: "run:launched"; sourceCount: number }
  | { type: "source:finished"; sourceId: string; itemCount: number }
  | { type: "pipeline:created"; pipeline: Pipeline<T>; done: boolean }
  | { type: "pipeline:advanced"; pipeline: Pipeline<T>; done: boolean };

export interface ImportCounters {
  sourcesStarted: number;
  sourcesFinished: number;
  pipelinesCreated: number;
  pipelinesFinished: number;
}
