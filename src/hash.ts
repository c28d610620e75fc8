import { createHash } from 'node:crypto';
import { open } from 'node:fs/promises';

export const DEFAULT_SAMPLE_BYTES = 64 * 1024;

export type ByteRange = [offset: number, length: number];

/** Head, middle and tail samples; small files are read whole. */
export function sampleRanges(size: number, sampleBytes: number = DEFAULT_SAMPLE_BYTES): ByteRange[] {
  if (size <= 0) {
    return [];
  }

  if (size <= sampleBytes * 3) {
    return [[0, size]];
  }

  return [
    [0, sampleBytes],
    [Math.floor((size - sampleBytes) / 2), sampleBytes],
    [size - sampleBytes, sampleBytes],
  ];
}

export async function computePartialHash(
  path: string,
  sampleBytes: number = DEFAULT_SAMPLE_BYTES
): Promise<string> {
  const handle = await open(path, 'r');

  try {
    const { size } = await handle.stat();
    const hash = createHash('sha1');

    hash.update(`${size}:`);

    for (const [offset, length] of sampleRanges(size, sampleBytes)) {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, offset);
      hash.update(buffer.subarray(0, bytesRead));
    }

    return hash.digest('hex');
  } finally {
    await handle.close();
  }
}
