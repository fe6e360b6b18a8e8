import { z } from "zod";

export interface Item {
  key: string;
  name: string;
  excluded: boolean;
  removed: boolean;
}

export type AdditionalData = Record<string, unknown>;

export const ItemShapeSchema = z
  .object({
    key: z.string().min(1),
    name: z.string(),
    excluded: z.boolean(),
    removed: z.boolean(),
  })
  .passthrough();

export const AdditionalDataSchema = z.record(z.unknown());

export function isItem(value: unknown): value is Item {
  return ItemShapeSchema.safeParse(value).success;
}

export function createItem<T extends object>(
  fields: T & { key: string; name: string }
): T & Item {
  return { excluded: false, removed: false, ...fields };
}
