/**
 * Object-or-Array Payload Decoder
 *
 * Bulk endpoints accept either a single object or an array of objects.
 * The shape is decided by the first significant character instead of
 * trial parsing, so the result is always a list.
 */

import { z, type ZodTypeAny } from 'zod';
import { CollectionDecodeError } from '@/errors/apiErrors';

export type PayloadShape = 'array' | 'object' | 'other';

const INSIGNIFICANT = new Set([' ', '\t', '\n', '\r', '\uFEFF']);

/**
 * Classify raw JSON text by its first non-whitespace character
 */
export function payloadShape(raw: string): PayloadShape {
  for (const char of raw) {
    if (INSIGNIFICANT.has(char)) continue;
    if (char === '[') return 'array';
    if (char === '{') return 'object';
    return 'other';
  }
  return 'other';
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new CollectionDecodeError(
      `Malformed JSON payload: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Decode `raw` into a list of items validated by `itemSchema`
 *
 * Empty, `null` and non-structural payloads produce `[]`; callers treat an
 * empty list as a valid outcome. Throws CollectionDecodeError for broken
 * JSON and ZodError for items that fail validation.
 */
export function decodeCollection<S extends ZodTypeAny>(
  raw: string,
  itemSchema: S
): z.output<S>[] {
  switch (payloadShape(raw)) {
    case 'array':
      return z.array(itemSchema).parse(parseJson(raw));
    case 'object':
      return [itemSchema.parse(parseJson(raw))];
    default:
      return [];
  }
}

/**
 * Read a request body as text and decode it with decodeCollection
 */
export async function readCollection<S extends ZodTypeAny>(
  req: { text(): Promise<string> },
  itemSchema: S
): Promise<z.output<S>[]> {
  return decodeCollection(await req.text(), itemSchema);
}
