const encoder = new TextEncoder();
// A leading byte order mark is part of the content and must survive decoding.
const lossyDecoder = new TextDecoder("utf-8", { ignoreBOM: true });
const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode UTF-8, replacing invalid sequences with U+FFFD. */
export function decodeToString(data: Uint8Array): string {
  return lossyDecoder.decode(data);
}

/** Decode UTF-8, throwing a TypeError on invalid sequences. */
export function decodeStrict(data: Uint8Array): string {
  return strictDecoder.decode(data);
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
