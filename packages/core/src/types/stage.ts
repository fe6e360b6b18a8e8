import type { AdditionalData, Item } from "./item";

export interface StageError {
  stage: string;
  item: string | null;
  message: string;
  cause: unknown;
}

export interface StageContract<T extends Item = Item> {
  readonly key: string;
  readonly runAfter: readonly string[];
  readonly blocking: boolean;
  appliesTo?(item: T): boolean;
  /** Resolves with the errors this execution produced. Never rejects. */
  execute(item: T, data: AdditionalData): Promise<StageError[]>;
  /** Returns every error accumulated so far and clears them. */
  collectErrors(): StageError[];
}

export function toStageError(stage: string, item: string | null, cause: unknown): StageError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return { stage, item, message, cause };
}

export function formatStageError(error: StageError): string {
  const subject = error.item ? `${error.stage} (${error.item})` : error.stage;
  return `${subject}: ${error.message}`;
}
