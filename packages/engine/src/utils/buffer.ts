const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const CRLF = "\r\n";
export const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * Decode one byte per character. Header blocks go through this so bytes
 * outside ASCII survive a parse and serialize unchanged.
 */
export function latin1ToString(data: Uint8Array): string {
  let text = "";
  // fromCharCode takes its arguments on the stack
  for (let i = 0; i < data.length; i += 8192) {
    text += String.fromCharCode(...data.subarray(i, i + 8192));
  }
  return text;
}

/** Inverse of `latin1ToString`; characters above U+00FF keep their low byte. */
export function stringToLatin1(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i) & 0xff;
  }
  return bytes;
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Index of the first occurrence of `sequence` in `buffer` at or after
 * `fromIndex`, or -1.
 */
export function findSequence(
  buffer: Uint8Array,
  sequence: Uint8Array,
  fromIndex = 0,
): number {
  outer: for (
    let i = Math.max(0, fromIndex);
    i <= buffer.length - sequence.length;
    i++
  ) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}
