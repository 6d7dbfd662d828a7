import { TextDecoder } from 'util';
import { FormatError } from './errors';

export const DEFAULT_CHARACTER_ENCODING = 'US-ASCII';

// Charset names as written in schemas, upper-cased, to Node buffer encodings
const BUFFER_ENCODINGS: ReadonlyMap<string, BufferEncoding> = new Map<string, BufferEncoding>([
  ['US-ASCII', 'ascii'],
  ['ASCII', 'ascii'],
  ['UTF-8', 'utf8'],
  ['UTF8', 'utf8'],
  ['ISO-8859-1', 'latin1'],
  ['ISO8859-1', 'latin1'],
  ['LATIN1', 'latin1'],
  ['UTF-16LE', 'utf16le'],
  ['UTF16LE', 'utf16le'],
]);

export const SUPPORTED_CHARACTER_ENCODINGS: readonly string[] = Array.from(BUFFER_ENCODINGS.keys());

export function isSupportedCharacterEncoding(name: string): boolean {
  return BUFFER_ENCODINGS.has(name.toUpperCase());
}

export function toBufferEncoding(name: string): BufferEncoding {
  const encoding = BUFFER_ENCODINGS.get(name.toUpperCase());
  if (encoding === undefined) {
    throw new FormatError(`Unsupported character encoding: ${name}`);
  }
  return encoding;
}

export function encodeText(text: string, characterEncoding: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, toBufferEncoding(characterEncoding)));
}

/**
 * Decode bytes for display. Names outside the buffer table go through the WHATWG
 * decoder; a name neither knows, or no name at all, decodes as the default encoding.
 */
export function decodeText(bytes: Uint8Array, characterEncoding: string = DEFAULT_CHARACTER_ENCODING): string {
  const encoding = BUFFER_ENCODINGS.get(characterEncoding.toUpperCase());
  if (encoding !== undefined) {
    return toBuffer(bytes).toString(encoding);
  }
  const decoder = whatwgDecoder(characterEncoding);
  return decoder ? decoder.decode(bytes) : toBuffer(bytes).toString(toBufferEncoding(DEFAULT_CHARACTER_ENCODING));
}

function whatwgDecoder(label: string): TextDecoder | undefined {
  try {
    return new TextDecoder(label);
  } catch (error) {
    if (error instanceof RangeError) {
      return undefined;
    }
    throw error;
  }
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
