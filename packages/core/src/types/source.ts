import type { AdditionalData, Item } from "./item";

export type SourceYield<T extends Item> = T | readonly [T, AdditionalData] | null | undefined;

export interface SourceContract<T extends Item = Item> {
  readonly id: string;
  isInstalled(): boolean | Promise<boolean>;
  scan(): Iterable<SourceYield<T>> | AsyncIterable<SourceYield<T>>;
}

export type SourceResult<T extends Item> =
  | { kind: "discovered"; item: T; data: AdditionalData }
  | { kind: "skipped" }
  | { kind: "invalid"; reason: string };

export interface Discovered<T extends Item> {
  item: T;
  data: AdditionalData;
}
