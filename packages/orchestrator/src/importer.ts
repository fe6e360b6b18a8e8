import { randomUUID } from "node:crypto";
import {
  type AdditionalData,
  DuplicateStageError,
  ImportlineError,
  type Item,
  type Logger,
  type SourceContract,
  StageCycleError,
  type StageError,
  silentLogger,
} from "@importline/core";
import type { Pipeline } from "@importline/pipeline";
import { discover } from "@importline/sources";
import { EventChannel } from "./channel";
import type { ImportCounters, ImportEvent } from "./events";
import type { ItemRegistrar } from "./store";
import { type ImportObserver, type ImportSummary, formatSummary } from "./summary";

export interface ImporterOptions<T extends Item> {
  registry: ItemRegistrar<T>;
  observer?: ImportObserver;
  logger?: Logger;
  runId?: string;
}

type ImporterState = "idle" | "running" | "finished";

/**
 * Scans every added source concurrently and runs each new item through its pipeline.
 *
 * Workers never touch the run's bookkeeping directly. They push events into one
 * channel, and a single coordinator applies them in order and checks for completion
 * after each one, so the run finishes exactly once even though sources and pipelines
 * complete in any order.
 */
export class Importer<T extends Item = Item> {
  readonly runId: string;

  private readonly registry: ItemRegistrar<T>;
  private readonly observer: ImportObserver;
  private readonly logger: Logger;
  private readonly sources = new Set<SourceContract<T>>();
  private readonly pipelineSet = new Set<Pipeline<T>>();
  private readonly channel = new EventChannel<ImportEvent<T>>();
  private readonly counts: ImportCounters = {
    sourcesStarted: 0,
    sourcesFinished: 0,
    pipelinesCreated: 0,
    pipelinesFinished: 0,
  };
  private launched = false;
  private state: ImporterState = "idle";

  constructor(options: ImporterOptions<T>) {
    this.registry = options.registry;
    this.observer = options.observer ?? {};
    this.runId = options.runId ?? randomUUID();
    this.logger = (options.logger ?? silentLogger).child({ runId: this.runId });
  }

  addSource(source: SourceContract<T>): void {
    if (this.state !== "idle") {
      throw new ImportlineError("Sources must be added before the import runs");
    }
    this.sources.add(source);
  }

  get counters(): ImportCounters {
    return { ...this.counts };
  }

  get pipelines(): readonly Pipeline<T>[] {
    return [...this.pipelineSet];
  }

  get finished(): boolean {
    return this.state === "finished";
  }

  get progress(): number {
    if (this.pipelineSet.size === 0) return 1;

    let total = 0;
    for (const pipeline of this.pipelineSet) {
      total += pipeline.progress;
    }
    return total / this.pipelineSet.size;
  }

  get importedCount(): number {
    let count = 0;
    for (const pipeline of this.pipelineSet) {
      if (!pipeline.item.excluded && !pipeline.item.removed) count++;
    }
    return count;
  }

  async run(): Promise<ImportSummary> {
    if (this.state !== "idle") {
      throw new ImportlineError("An importer can only run once");
    }
    this.state = "running";

    const sources = [...this.sources];
    for (const source of sources) {
      this.logger.debug("Importing items from source", { source: source.id });
      this.channel.push({ type: "source:started", sourceId: source.id });
    }
    this.channel.push({ type: "run:launched", sourceCount: sources.length });

    const coordinator = this.coordinate();
    const workers = Promise.all(sources.map((source) => this.scanSource(source)));

    const [summary] = await Promise.all([coordinator, workers]);
    return summary;
  }

  private async scanSource(source: SourceContract<T>): Promise<void> {
    const log = this.logger.child({ source: source.id });
    let itemCount = 0;

    try {
      for await (const { item, data } of discover(source, this.logger)) {
        const pipeline = this.register(item, data, log);
        if (!pipeline) continue;

        itemCount++;
        log.info("Imported item", { item: item.key, name: item.name });

        pipeline.onAdvanced((advanced) => {
          this.channel.push({ type: "pipeline:advanced", pipeline: advanced, done: advanced.isDone });
        });
        this.channel.push({ type: "pipeline:created", pipeline, done: pipeline.isDone });

        try {
          await pipeline.run();
        } catch (error) {
          log.error("Pipeline failed to run", { item: item.key, error });
        }
      }
    } catch (error) {
      log.error("Source worker stopped early", { error });
    }

    this.channel.push({ type: "source:finished", sourceId: source.id, itemCount });
  }

  private register(item: T, data: AdditionalData, log: Logger): Pipeline<T> | null {
    try {
      return this.registry.register(item, data);
    } catch (error) {
      if (error instanceof StageCycleError || error instanceof DuplicateStageError) {
        log.error("Stage configuration error, item skipped", { item: item.key, error });
      } else {
        log.error("Item registration failed", { item: item.key, error });
      }
      return null;
    }
  }

  private async coordinate(): Promise<ImportSummary> {
    for await (const event of this.channel) {
      this.apply(event);
      this.notify((observer) => observer.onProgress?.(this.progress));

      if (this.isComplete()) {
        return this.finalize();
      }
    }

    throw new ImportlineError("Import events stopped before the run completed");
  }

  private apply(event: ImportEvent<T>): void {
    switch (event.type) {
      case "source:started":
        this.counts.sourcesStarted++;
        break;
      case "run:launched":
        this.launched = true;
        this.logger.info("Import launched", { sources: event.sourceCount });
        break;
      case "source:finished":
        this.counts.sourcesFinished++;
        this.logger.debug("Import done for source", {
          source: event.sourceId,
          items: event.itemCount,
        });
        break;
      case "pipeline:created":
        this.pipelineSet.add(event.pipeline);
        this.counts.pipelinesCreated++;
        // A pipeline without stages never advances.
        if (event.done) this.counts.pipelinesFinished++;
        break;
      case "pipeline:advanced":
        if (event.done) this.counts.pipelinesFinished++;
        break;
    }
  }

  private isComplete(): boolean {
    const { sourcesStarted, sourcesFinished, pipelinesCreated, pipelinesFinished } = this.counts;
    return (
      this.launched &&
      sourcesStarted === sourcesFinished &&
      pipelinesCreated === pipelinesFinished
    );
  }

  private finalize(): ImportSummary {
    this.state = "finished";
    this.channel.close();

    const errors: StageError[] = [
      ...this.registry.collectErrors(),
      ...this.pipelines.flatMap((pipeline) => pipeline.violations),
    ];
    const importedCount = this.importedCount;
    const summary: ImportSummary = {
      runId: this.runId,
      importedCount,
      counters: this.counters,
      errors,
      message: formatSummary(importedCount),
    };

    this.logger.info("Import done", { imported: importedCount, errors: errors.length });

    this.notify((observer) => observer.onFinished?.(summary));
    if (errors.length > 0) {
      this.notify((observer) => observer.onErrors?.(errors));
    }
    this.notify((observer) => observer.onSummary?.(summary.message, importedCount));

    return summary;
  }

  private notify(call: (observer: ImportObserver) => void): void {
    try {
      call(this.observer);
    } catch (error) {
      this.logger.error("Import observer failed", { error });
    }
  }
}
