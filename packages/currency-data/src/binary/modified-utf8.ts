/**
 * "Modified UTF-8" as written by DataOutput.writeUtf: U+0000 takes two
 * bytes (C0 80) and each UTF-16 code unit is encoded on its own, so
 * surrogate pairs become two 3-byte sequences.
 */
export function encodeModifiedUtf8(value: string): Uint8Array {
  let length = 0;
  for (let i = 0; i < value.length; i++) {
    const c = value.charCodeAt(i);
    length += c >= 0x0001 && c <= 0x007f ? 1 : c <= 0x07ff ? 2 : 3;
  }

  const bytes = new Uint8Array(length);
  let pos = 0;
  for (let i = 0; i < value.length; i++) {
    const c = value.charCodeAt(i);
    if (c >= 0x0001 && c <= 0x007f) {
      bytes[pos++] = c;
    } else if (c <= 0x07ff) {
      bytes[pos++] = 0xc0 | ((c >> 6) & 0x1f);
      bytes[pos++] = 0x80 | (c & 0x3f);
    } else {
      bytes[pos++] = 0xe0 | ((c >> 12) & 0x0f);
      bytes[pos++] = 0x80 | ((c >> 6) & 0x3f);
      bytes[pos++] = 0x80 | (c & 0x3f);
    }
  }
  return bytes;
}

/**
 * Inverse of encodeModifiedUtf8. Returns undefined on a malformed sequence.
 */
export function decodeModifiedUtf8(view: DataView, offset: number, length: number): string | undefined {
  let result = '';
  let pos = offset;
  const end = offset + length;

  const continuation = (at: number): number | undefined => {
    if (at >= end) return undefined;
    const byte = view.getUint8(at);
    return (byte & 0xc0) === 0x80 ? byte & 0x3f : undefined;
  };

  while (pos < end) {
    const a = view.getUint8(pos);
    if ((a & 0x80) === 0) {
      result += String.fromCharCode(a);
      pos += 1;
    } else if ((a & 0xe0) === 0xc0) {
      const b = continuation(pos + 1);
      if (b === undefined) return undefined;
      result += String.fromCharCode(((a & 0x1f) << 6) | b);
      pos += 2;
    } else if ((a & 0xf0) === 0xe0) {
      const b = continuation(pos + 1);
      const c = continuation(pos + 2);
      if (b === undefined || c === undefined) return undefined;
      result += String.fromCharCode(((a & 0x0f) << 12) | (b << 6) | c);
      pos += 3;
    } else {
      return undefined;
    }
  }
  return result;
}
