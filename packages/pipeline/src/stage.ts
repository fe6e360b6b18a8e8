import {
  type AdditionalData,
  type Item,
  type StageContract,
  type StageError,
  toStageError,
} from "@importline/core";

export type StageListener = () => void;

/**
 * Base class for post-processing stages.
 *
 * Subclasses implement {@link Stage.process}. Anything it throws is recorded as a
 * {@link StageError} instead of propagating, so one failing stage never stops the
 * other stages of the same item. A single instance is shared by every pipeline of
 * a run, which is why errors accumulate here until {@link Stage.collectErrors}.
 */
export abstract class Stage<T extends Item = Item> implements StageContract<T> {
  abstract readonly key: string;
  readonly runAfter: readonly string[] = [];
  readonly blocking: boolean = true;

  private errors: StageError[] = [];
  private readonly inFlight = new Map<string, StageError[]>();
  private readonly startedListeners = new Set<StageListener>();
  private readonly doneListeners = new Set<StageListener>();
  private controller = new AbortController();

  protected abstract process(item: T, data: AdditionalData, signal: AbortSignal): Promise<void>;

  appliesTo(_item: T): boolean {
    return true;
  }

  async execute(item: T, data: AdditionalData): Promise<StageError[]> {
    const produced: StageError[] = [];
    this.inFlight.set(item.key, produced);

    this.emit(this.startedListeners, item);
    try {
      await this.process(item, data, this.signal);
    } catch (error) {
      this.reportError(error, item);
    }
    this.emit(this.doneListeners, item);

    this.inFlight.delete(item.key);
    return produced;
  }

  reportError(error: unknown, item?: T): StageError {
    const stageError = toStageError(this.key, item?.key ?? null, error);
    this.errors.push(stageError);
    if (item) this.inFlight.get(item.key)?.push(stageError);
    return stageError;
  }

  collectErrors(): StageError[] {
    const collected = this.errors;
    this.errors = [];
    return collected;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Aborts in-flight work and arms a fresh signal for the items that follow. */
  cancel(reason?: unknown): void {
    const previous = this.controller;
    this.controller = new AbortController();
    previous.abort(reason);
  }

  onStarted(listener: StageListener): () => void {
    this.startedListeners.add(listener);
    return () => this.startedListeners.delete(listener);
  }

  onDone(listener: StageListener): () => void {
    this.doneListeners.add(listener);
    return () => this.doneListeners.delete(listener);
  }

  private emit(listeners: Set<StageListener>, item: T): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        this.reportError(error, item);
      }
    }
  }
}
