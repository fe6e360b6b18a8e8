import { describe, expect, test } from "vitest";
import { EventChannel } from "./channel";

async function drain<T>(channel: EventChannel<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) values.push(value);
  return values;
}

describe("EventChannel", () => {
  test("delivers buffered values in push order", async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.push(3);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2, 3]);
  });

  test("wakes a waiting consumer on push and ends on close", async () => {
    const channel = new EventChannel<string>();
    const drained = drain(channel);

    await Promise.resolve();
    channel.push("a");
    setTimeout(() => {
      channel.push("b");
      channel.close();
    }, 5);

    expect(await drained).toEqual(["a", "b"]);
  });

  test("values pushed before close are still delivered", async () => {
    const channel = new EventChannel<string>();
    channel.push("last");
    channel.close();

    expect(channel.isClosed).toBe(true);
    expect(channel.size).toBe(1);
    expect(await drain(channel)).toEqual(["last"]);
  });

  test("rejects pushes after close", () => {
    const channel = new EventChannel<number>();
    channel.close();

    expect(() => channel.push(1)).toThrow("closed channel");
  });
});
