import {
  type AdditionalData,
  type Item,
  type Logger,
  type StageContract,
  type StageError,
  silentLogger,
} from "@importline/core";
import { Pipeline, assertUniqueKeys } from "@importline/pipeline";

/** Registration service consulted by the importer for every discovered item. */
export interface ItemRegistrar<T extends Item = Item> {
  /**
   * Returns a pipeline ready to run, or `null` when the item is a duplicate.
   * May throw a configuration error, in which case the item is not registered.
   */
  register(item: T, data: AdditionalData): Pipeline<T> | null;
  /** Errors gathered by every stage since the last call. */
  collectErrors(): StageError[];
}

export interface ItemStoreOptions<T extends Item> {
  stages: readonly StageContract<T>[];
  excludedKeys?: Iterable<string>;
  removedKeys?: Iterable<string>;
  logger?: Logger;
}

export class ItemStore<T extends Item = Item> implements ItemRegistrar<T> {
  readonly stages: readonly StageContract<T>[];
  private readonly items = new Map<string, T>();
  private readonly excludedKeys: ReadonlySet<string>;
  private readonly removedKeys: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: ItemStoreOptions<T>) {
    assertUniqueKeys(options.stages);
    this.stages = options.stages;
    this.excludedKeys = new Set(options.excludedKeys);
    this.removedKeys = new Set(options.removedKeys);
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.items.size;
  }

  get(key: string): T | undefined {
    return this.items.get(key);
  }

  register(item: T, data: AdditionalData): Pipeline<T> | null {
    if (this.items.has(item.key)) {
      this.logger.debug("Duplicate item ignored", { item: item.key });
      return null;
    }

    const applicable = this.stages.filter((stage) => stage.appliesTo?.(item) ?? true);
    const pipeline = new Pipeline(item, data, applicable, { logger: this.logger });

    if (this.excludedKeys.has(item.key)) item.excluded = true;
    if (this.removedKeys.has(item.key)) item.removed = true;

    this.items.set(item.key, item);
    return pipeline;
  }

  collectErrors(): StageError[] {
    return this.stages.flatMap((stage) => stage.collectErrors());
  }
}
