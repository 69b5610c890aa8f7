/**
 * Path Variant Generation
 *
 * A normalized path is an identity, not an archive entry name. To read a
 * charter back out of an old backup we need the exact bytes that backup used,
 * which depend on the encoding quirks of the tool version that wrote it.
 * generatePathVariants lists the plausible spellings, most likely first.
 *
 * Never used for identity comparison.
 *
 * @module normalization/path-variants
 */

import iconv from 'iconv-lite';

/** Characters the storage engine escapes in resource names */
const EXIST_SPECIAL_CHARS: ReadonlyArray<readonly [string, string]> = [['|', '&7C;']];

/**
 * Re-apply the storage engine's `&XX;` escaping
 */
export function encodeExistPath(path: string): string {
  let result = path;
  for (const [char, encoded] of EXIST_SPECIAL_CHARS) {
    result = result.split(char).join(encoded);
  }
  return result;
}

/**
 * Percent-encode everything outside the unreserved set, keeping `/`
 */
export function percentEncodePath(path: string): string {
  return encodeURIComponent(path)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/');
}

/**
 * UTF-8 bytes read back as Latin-1
 */
export function latin1Corruption(path: string): string {
  return Buffer.from(path, 'utf8').toString('latin1');
}

/**
 * UTF-8 bytes read back as code page 437 (legacy ZIP tools)
 */
export function cp437Corruption(path: string): string {
  return iconv.decode(Buffer.from(path, 'utf8'), 'cp437');
}

/**
 * Generate encoding variants of a path, ordered by likelihood.
 *
 * Order: raw, normalized, hex-escaped, percent-encoded, CP437-misread,
 * hex-escaped then CP437-misread, Latin-1-misread, hex-escaped then
 * Latin-1-misread. Misreadings are only listed when they change the string.
 * Duplicates keep their first position.
 */
export function generatePathVariants(
  normalizedPath: string,
  rawPath?: string | null
): string[] {
  const variants: string[] = [];
  const add = (candidate: string): void => {
    if (!variants.includes(candidate)) {
      variants.push(candidate);
    }
  };

  if (rawPath) {
    add(rawPath);
  }
  add(normalizedPath);

  const existEncoded = encodeExistPath(normalizedPath);
  add(existEncoded);
  add(percentEncodePath(normalizedPath));

  const cp437 = cp437Corruption(normalizedPath);
  if (cp437 !== normalizedPath) add(cp437);

  const existCp437 = cp437Corruption(existEncoded);
  if (existCp437 !== existEncoded) add(existCp437);

  const latin1 = latin1Corruption(normalizedPath);
  if (latin1 !== normalizedPath) add(latin1);

  const existLatin1 = latin1Corruption(existEncoded);
  if (existLatin1 !== existEncoded) add(existLatin1);

  return variants;
}
