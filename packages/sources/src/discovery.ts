import {
  type AdditionalData,
  AdditionalDataSchema,
  type Discovered,
  type Item,
  type Logger,
  type SourceContract,
  type SourceResult,
  type SourceYield,
  isItem,
  silentLogger,
} from "@importline/core";

function describeShape(value: unknown): string {
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value === null) return "null";
  return typeof value;
}

function isPair<T extends Item>(
  value: T | readonly [T, AdditionalData]
): value is readonly [T, AdditionalData] {
  return Array.isArray(value);
}

export function classifyResult<T extends Item>(value: SourceYield<T>): SourceResult<T> {
  if (value === null || value === undefined) {
    return { kind: "skipped" };
  }

  if (isPair(value)) {
    const [item, data] = value;
    if (value.length === 2 && isItem(item) && AdditionalDataSchema.safeParse(data).success) {
      return { kind: "discovered", item, data };
    }
  } else if (isItem(value)) {
    return { kind: "discovered", item: value, data: {} };
  }

  return { kind: "invalid", reason: `unexpected ${describeShape(value)}` };
}

function isAsyncIterable<T>(
  iterable: Iterable<T> | AsyncIterable<T>
): iterable is AsyncIterable<T> {
  return Symbol.asyncIterator in iterable;
}

function openIterator<T>(
  iterable: Iterable<T> | AsyncIterable<T>
): Iterator<T> | AsyncIterator<T> {
  if (isAsyncIterable(iterable)) {
    return iterable[Symbol.asyncIterator]();
  }
  return iterable[Symbol.iterator]();
}

/**
 * Pulls every discovered item out of a source.
 *
 * A failing step is logged and iteration carries on with the next one, so a single
 * broken entry never ends the scan. Skip markers are dropped quietly and
 * unrecognised values are logged as warnings.
 */
export async function* discover<T extends Item>(
  source: SourceContract<T>,
  logger: Logger = silentLogger
): AsyncGenerator<Discovered<T>> {
  const log = logger.child({ source: source.id });

  if (!(await source.isInstalled())) {
    log.info("Source skipped, not installed");
    return;
  }
  log.info("Scanning source");

  const iterator = openIterator(source.scan());

  while (true) {
    let step: IteratorResult<SourceYield<T>>;
    try {
      step = await iterator.next();
    } catch (error) {
      log.error("Exception in source", { error });
      continue;
    }
    if (step.done) break;

    const result = classifyResult(step.value);
    switch (result.kind) {
      case "discovered":
        yield { item: result.item, data: result.data };
        break;
      case "skipped":
        break;
      case "invalid":
        log.warn("Source produced an invalid result", { reason: result.reason });
        break;
    }
  }
}
