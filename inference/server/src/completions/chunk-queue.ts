/**
 * Bridges the engine's push-style text callback to a pull-style async
 * iterable. Single consumer, single pass.
 */

export interface ChunkQueue extends AsyncIterable<string> {
  push(chunk: string): void;
  close(): void;
  fail(error: unknown): void;
}

export function createChunkQueue(): ChunkQueue {
  const buffer: string[] = [];
  let closed = false;
  let failure: { error: unknown } | null = null;
  let wake: (() => void) | null = null;
  let iterating = false;

  function notify(): void {
    const resume = wake;
    wake = null;
    resume?.();
  }

  async function* drain(): AsyncGenerator<string> {
    while (true) {
      const next = buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (failure) throw failure.error;
      if (closed) return;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  }

  return {
    push(chunk) {
      if (closed) return;
      buffer.push(chunk);
      notify();
    },
    close() {
      closed = true;
      notify();
    },
    fail(error) {
      if (closed) return;
      failure = { error };
      closed = true;
      notify();
    },
    [Symbol.asyncIterator]() {
      if (iterating) {
        throw new Error("Chunk queue can only be consumed once");
      }
      iterating = true;
      return drain();
    },
  };
}
