import { Transform, pipeline, type Readable } from "node:stream";

import { TransferTimeoutError } from "./errors.js";

/**
 * Passes `source` through untouched but destroys the transfer with a
 * TransferTimeoutError when no chunk arrives for `timeoutMs`.
 */
export function withIdleTimeout(source: Readable, timeoutMs: number): Readable {
  let timer: NodeJS.Timeout | undefined;

  const watchdog = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      arm();
      callback(null, chunk);
    },
    flush(callback) {
      clearTimeout(timer);
      callback();
    },
  });

  function arm(): void {
    clearTimeout(timer);
    timer = setTimeout(() => watchdog.destroy(new TransferTimeoutError(timeoutMs)), timeoutMs);
    timer.unref();
  }

  arm();
  pipeline(source, watchdog, () => clearTimeout(timer));
  return watchdog;
}

export async function readAll(source: AsyncIterable<Uint8Array | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
