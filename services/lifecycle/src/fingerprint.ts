import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { Transform } from "node:stream";
import type { Readable } from "node:stream";

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * MD5 over a byte stream. The digest is only produced once the stream has
 * ended; a read error rejects without a partial result.
 */
export async function fingerprintStream(source: Readable | AsyncIterable<Uint8Array | string>): Promise<string> {
  const hash = createHash("md5");
  for await (const chunk of source) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export async function fingerprintFile(path: string, chunkSize = DEFAULT_CHUNK_SIZE): Promise<string> {
  return fingerprintStream(createReadStream(path, { highWaterMark: chunkSize }));
}

/**
 * The document library does not hand out content cheaply during a crawl, so its
 * records are fingerprinted from the item's address and modification time.
 * Two equal values mean "unchanged metadata", not "identical bytes".
 */
export function fingerprintRemoteItem(path: string, lastModified: Date): string {
  return createHash("md5").update(`${path}${lastModified.toISOString()}`).digest("hex");
}

export function fingerprintsMatch(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.trim().toLowerCase();
}

/** Pass-through that hashes what flows through it, for checking what was actually sent. */
export function hashingPassThrough(): { stream: Transform; digest: () => string } {
  const hash = createHash("md5");
  let digest: string | undefined;
  const stream = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      callback(null, chunk);
    },
  });
  return {
    stream,
    digest: () => {
      digest ??= hash.digest("hex");
      return digest;
    },
  };
}
