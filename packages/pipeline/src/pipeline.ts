import {
  type AdditionalData,
  ImportlineError,
  type Item,
  type Logger,
  type StageContract,
  type StageError,
  silentLogger,
  toStageError,
} from "@importline/core";
import { resolveStageOrder } from "./ordering";

export type AdvancedListener<T extends Item> = (pipeline: Pipeline<T>) => void;

export interface PipelineOptions {
  logger?: Logger;
}

/**
 * Drives one item through its applicable stages.
 *
 * The execution order is resolved once, at construction, so a dependency cycle
 * fails here rather than halfway through a run. Blocking stages are awaited before
 * the next stage starts; non-blocking ones run alongside later stages but are still
 * awaited by any stage that lists them in `runAfter`.
 */
export class Pipeline<T extends Item = Item> {
  readonly item: T;
  readonly data: AdditionalData;
  readonly stages: readonly StageContract<T>[];
  /** Every error returned by this pipeline's stage executions. */
  readonly errors: StageError[] = [];
  /** Rejections from stages that broke the never-reject contract. */
  readonly violations: StageError[] = [];

  private completed = 0;
  private started = false;
  private readonly listeners = new Set<AdvancedListener<T>>();
  private readonly logger: Logger;

  constructor(
    item: T,
    data: AdditionalData,
    stages: readonly StageContract<T>[],
    options: PipelineOptions = {}
  ) {
    this.item = item;
    this.data = data;
    this.stages = resolveStageOrder(stages);
    this.logger = (options.logger ?? silentLogger).child({ item: item.key });
  }

  get totalStageCount(): number {
    return this.stages.length;
  }

  get completedStageCount(): number {
    return this.completed;
  }

  get progress(): number {
    if (this.stages.length === 0) return 1;
    return this.completed / this.stages.length;
  }

  get isDone(): boolean {
    return this.completed === this.stages.length;
  }

  onAdvanced(listener: AdvancedListener<T>): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async run(): Promise<void> {
    if (this.started) {
      throw new ImportlineError(`Pipeline for ${this.item.key} has already run`);
    }
    this.started = true;

    const settled = new Map<string, Promise<void>>();

    for (const stage of this.stages) {
      const prerequisites = stage.runAfter.flatMap((key) => settled.get(key) ?? []);
      const task = Promise.all(prerequisites).then(() => this.runStage(stage));
      settled.set(stage.key, task);

      if (stage.blocking) await task;
    }

    await Promise.all(settled.values());
  }

  private async runStage(stage: StageContract<T>): Promise<void> {
    let errors: StageError[];

    try {
      errors = await stage.execute(this.item, this.data);
    } catch (error) {
      this.logger.error("Stage rejected instead of reporting its error", {
        stage: stage.key,
        error,
      });
      const violation = toStageError(stage.key, this.item.key, error);
      this.violations.push(violation);
      errors = [violation];
    }

    this.errors.push(...errors);
    this.completed++;
    this.emitAdvanced();
  }

  private emitAdvanced(): void {
    for (const listener of this.listeners) {
      try {
        listener(this);
      } catch (error) {
        this.logger.error("Pipeline advance listener failed", { error });
      }
    }
  }
}
