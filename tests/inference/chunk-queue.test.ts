import { describe, expect, it } from "vitest";
import { createChunkQueue } from "../../inference/server/src/completions/chunk-queue.js";

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("createChunkQueue", () => {
  it("delivers chunks pushed before and during iteration", async () => {
    const queue = createChunkQueue();
    queue.push("a");
    const collected = collect(queue);
    queue.push("b");
    setTimeout(() => {
      queue.push("c");
      queue.close();
    }, 5);
    await expect(collected).resolves.toEqual(["a", "b", "c"]);
  });

  it("delivers buffered chunks before the failure", async () => {
    const queue = createChunkQueue();
    const seen: string[] = [];
    queue.push("partial");
    queue.fail(new Error("engine crashed"));

    await expect((async () => {
      for await (const item of queue) seen.push(item);
    })()).rejects.toThrow("engine crashed");
    expect(seen).toEqual(["partial"]);
  });

  it("drops pushes after close", async () => {
    const queue = createChunkQueue();
    queue.push("kept");
    queue.close();
    queue.push("dropped");
    queue.fail(new Error("ignored"));
    await expect(collect(queue)).resolves.toEqual(["kept"]);
  });

  it("can only be consumed once", () => {
    const queue = createChunkQueue();
    queue[Symbol.asyncIterator]();
    expect(() => queue[Symbol.asyncIterator]()).toThrow("Chunk queue can only be consumed once");
  });
});
