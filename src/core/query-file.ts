import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { QueryFileError, getErrorMessage } from './errors.js';

export type QueryFileEncoding = 'utf8' | 'utf8-bom' | 'utf16le' | 'utf16be';

export interface QueryFile {
  path: string;
  content: string;
  encoding: QueryFileEncoding;
  sizeBytes: number;
}

/**
 * Decode raw bytes, honoring a UTF-8 or UTF-16 byte order mark.
 */
export function decodeQueryBytes(bytes: Buffer): { text: string; encoding: QueryFileEncoding } {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { text: bytes.subarray(3).toString('utf8'), encoding: 'utf8-bom' };
  }
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { text: bytes.subarray(2).toString('utf16le'), encoding: 'utf16le' };
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    const body = Buffer.from(bytes.subarray(2));
    // swap16 requires an even length
    const even = body.length % 2 === 0 ? body : body.subarray(0, body.length - 1);
    return { text: Buffer.from(even).swap16().toString('utf16le'), encoding: 'utf16be' };
  }
  return { text: bytes.toString('utf8'), encoding: 'utf8' };
}

export async function readQueryFile(filePath: string, cwd: string = process.cwd()): Promise<QueryFile> {
  const resolved = path.resolve(cwd, filePath);

  let bytes: Buffer;
  try {
    bytes = await readFile(resolved);
  } catch (error) {
    throw new QueryFileError(
      `The query file '${filePath}' could not be read.\nResolved path: ${resolved}`,
      getErrorMessage(error)
    );
  }

  const { text, encoding } = decodeQueryBytes(bytes);
  if (!text.trim()) {
    throw new QueryFileError(`Query file '${filePath}' is empty or contains only whitespace`);
  }

  return { path: resolved, content: text.trim(), encoding, sizeBytes: bytes.length };
}
