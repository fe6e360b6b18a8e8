import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import {
  type Item,
  type Logger,
  type SourceContract,
  type SourceYield,
  createItem,
  silentLogger,
} from "@importline/core";
import { z } from "zod";

export const CatalogEntrySchema = z
  .object({
    key: z.string().min(1),
    name: z.string().min(1),
  })
  .passthrough();

export const CatalogFileSchema = z.object({
  items: z.array(z.unknown()),
});

export interface CatalogSourceOptions {
  id?: string;
  logger?: Logger;
}

/**
 * Source backed by a JSON file of the form `{ "items": [{ "key", "name", ... }] }`.
 * Fields beyond `key` and `name` travel to the stages as additional data.
 */
export class CatalogSource implements SourceContract<Item> {
  readonly id: string;
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    options: CatalogSourceOptions = {}
  ) {
    this.id = options.id ?? basename(path, extname(path));
    this.logger = (options.logger ?? silentLogger).child({ source: this.id });
  }

  isInstalled(): boolean {
    return existsSync(this.path);
  }

  async *scan(): AsyncGenerator<SourceYield<Item>> {
    const raw: unknown = JSON.parse(await readFile(this.path, "utf-8"));
    const catalog = CatalogFileSchema.parse(raw);

    for (const [index, value] of catalog.items.entries()) {
      const entry = CatalogEntrySchema.safeParse(value);
      if (!entry.success) {
        this.logger.warn("Skipping malformed catalog entry", {
          index,
          issues: entry.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
        yield null;
        continue;
      }

      const { key, name, ...extra } = entry.data;
      yield [createItem({ key, name }), extra];
    }
  }
}
