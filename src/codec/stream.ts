import { Readable } from 'stream';
import { TextDecoder } from 'util';

export function toBuffer(bytes: Uint8Array | ArrayBuffer): Buffer {
  if (bytes instanceof Uint8Array) return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return Buffer.from(bytes);
}

/**
 * Wraps bytes in an ended, paused stream. Everything is buffered up front,
 * so `readAll` can drain it synchronously.
 */
export function toStream(bytes: Uint8Array | ArrayBuffer): Readable {
  const stream = new Readable({ read() {} });
  stream.push(toBuffer(bytes));
  stream.push(null);
  return stream;
}

export function readAll(stream: Readable): Buffer {
  const chunks: Buffer[] = [];
  let chunk: unknown;
  while ((chunk = stream.read()) !== null) {
    if (Buffer.isBuffer(chunk)) chunks.push(chunk);
    else if (typeof chunk === 'string') chunks.push(Buffer.from(chunk, 'utf8'));
  }
  return Buffer.concat(chunks);
}

export type JsonTextEncoding = 'utf-8' | 'utf-16le' | 'utf-16be';

export function detectEncoding(bytes: Uint8Array): JsonTextEncoding {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  if (bytes.length >= 2) {
    if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
    if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
    // JSON text starts with an ASCII character, so a zero byte gives away UTF-16
    if (bytes[0] === 0 && bytes[1] !== 0) return 'utf-16be';
    if (bytes[0] !== 0 && bytes[1] === 0) return 'utf-16le';
  }
  return 'utf-8';
}

/** Decodes JSON bytes to text. The BOM, if any, is dropped; invalid sequences throw. */
export function decodeJsonBytes(bytes: Uint8Array): string {
  return new TextDecoder(detectEncoding(bytes), { fatal: true }).decode(bytes);
}
