const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Every byte value in [start, end], ascending, minus the excluded ones.
 */
export function byteRange(
  start: number,
  end: number,
  exclude: Iterable<number> = [],
): Uint8Array {
  const skip = new Set(exclude);
  const bytes: number[] = [];
  for (let value = start; value <= end; value++) {
    if (!skip.has(value)) bytes.push(value);
  }
  return Uint8Array.from(bytes);
}
