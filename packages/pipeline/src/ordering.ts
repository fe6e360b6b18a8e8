import { DuplicateStageError, StageCycleError } from "@importline/core";

export interface OrderedStage {
  readonly key: string;
  readonly runAfter: readonly string[];
}

export function assertUniqueKeys(stages: readonly OrderedStage[]): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.key)) throw new DuplicateStageError(stage.key);
    seen.add(stage.key);
  }
}

/**
 * Orders stages so that every stage comes after the stages named in its `runAfter`.
 * Prerequisites that are not part of `stages` are ignored. Stages without a relative
 * constraint keep their declaration order.
 *
 * @throws StageCycleError when the prerequisites form a cycle
 */
export function resolveStageOrder<S extends OrderedStage>(stages: readonly S[]): S[] {
  assertUniqueKeys(stages);

  const keys = new Set(stages.map((s) => s.key));
  const remaining = new Map<string, Set<string>>();
  for (const stage of stages) {
    if (stage.runAfter.includes(stage.key)) throw new StageCycleError([stage.key]);
    remaining.set(stage.key, new Set(stage.runAfter.filter((k) => keys.has(k))));
  }

  const ordered: S[] = [];
  const pending = [...stages];

  while (pending.length > 0) {
    const index = pending.findIndex((s) => remaining.get(s.key)?.size === 0);
    if (index === -1) {
      throw new StageCycleError(pending.map((s) => s.key));
    }

    const [next] = pending.splice(index, 1);
    ordered.push(next);
    for (const prerequisites of remaining.values()) {
      prerequisites.delete(next.key);
    }
  }

  return ordered;
}
