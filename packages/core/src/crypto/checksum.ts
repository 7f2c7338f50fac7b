import { createHash } from "crypto";
import { Writable } from "stream";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";

export type DigestAlgorithm = "md5" | "sha1" | "sha256";

/**
 * Digests a stream chunk by chunk; the content is never held in full.
 */
export async function digestStream(stream: Readable, algorithm: DigestAlgorithm): Promise<Buffer> {
  const hash = createHash(algorithm);
  await pipeline(
    stream,
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        hash.update(chunk);
        callback();
      },
    }),
  );
  return hash.digest();
}

/**
 * Digest of content already in memory.
 */
export function digestBuffer(content: string | Uint8Array, algorithm: DigestAlgorithm): Buffer {
  return createHash(algorithm).update(content).digest();
}
