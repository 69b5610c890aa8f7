/**
 * Charter Path Normalizer
 *
 * Canonicalizes raw archive paths so that the manifest listing and the ZIP
 * entry listing of the same backup, and backups written years apart by
 * different tool versions, agree on one identity per charter.
 *
 * Pipeline (in order):
 *   1. trim
 *   2. storage-engine hex escapes (`&7C;` -> `|`)
 *   3. HTML/XML character entities
 *   4. percent-decoding to a fixed point
 *   5. `+` as a literal space
 *   6. Unicode NFC
 *   7. separator cleanup (backslashes, repeated `/`, repeated spaces, trailing `/`)
 *
 * normalizePath never throws: a stage that fails hands its input through.
 *
 * @module normalization/path-normalizer
 */

import { decodeHTML } from 'entities';

/** Upper bound on whole-pipeline passes when converging to a fixed point */
const MAX_PASSES = 32;

const EXIST_HEX_ESCAPE = /&([0-9A-Fa-f]{2});/g;
const PERCENT_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

/**
 * Decode the storage engine's `&XX;` escapes
 */
export function decodeExistEscapes(text: string): string {
  return text.replace(EXIST_HEX_ESCAPE, (_match, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
}

function decodeEntities(text: string): string {
  try {
    return decodeHTML(text);
  } catch {
    return text;
  }
}

/**
 * Decode one level of percent escapes.
 *
 * Only well-formed `%XX` runs are decoded; a lone `%` stays literal. Throws
 * URIError when a run is not valid UTF-8.
 */
function percentDecodeOnce(text: string): string {
  return text.replace(PERCENT_RUN, (run) => decodeURIComponent(run));
}

/**
 * Percent-decode until the string stops changing or a step fails
 */
function percentDecodeFully(text: string): string {
  let current = text;
  for (;;) {
    let next: string;
    try {
      next = percentDecodeOnce(current);
    } catch {
      return current;
    }
    if (next === current) {
      return current;
    }
    current = next;
  }
}

function cleanSeparators(text: string): string {
  let result = text.replace(/\\/g, '/').replace(/\/{2,}/g, '/').replace(/ {2,}/g, ' ');
  if (result.length > 1 && result.endsWith('/')) {
    result = result.slice(0, -1);
  }
  return result;
}

function normalizeOnce(raw: string): string {
  let path = raw.trim();
  path = decodeExistEscapes(path);
  path = decodeEntities(path);
  path = percentDecodeFully(path);
  path = path.replace(/\+/g, ' ');
  path = path.normalize('NFC');
  return cleanSeparators(path);
}

/**
 * Normalize a charter path for identity comparison.
 *
 * Total, deterministic and idempotent: the pipeline is re-applied until its
 * output is stable, so `normalizePath(normalizePath(x)) === normalizePath(x)`.
 */
export function normalizePath(raw: string): string {
  let current = normalizeOnce(raw);
  for (let pass = 1; pass < MAX_PASSES; pass++) {
    const next = normalizeOnce(current);
    if (next === current) {
      break;
    }
    current = next;
  }
  return current;
}

/**
 * Collection path of a charter relative to the base collection.
 *
 * @returns '' for charters at the root of the base collection or outside it
 *
 * @example
 * ```typescript
 * extractParentPath('db/charters/AT-HHStA/Urkunden/1.xml', 'db/charters');
 * // => 'AT-HHStA/Urkunden'
 * ```
 */
export function extractParentPath(filePath: string, basePath: string): string {
  const normPath = normalizePath(filePath);
  const normBase = normalizePath(basePath).replace(/\/+$/, '');

  if (!normPath.startsWith(`${normBase}/`)) {
    return '';
  }

  const relative = normPath.slice(normBase.length).replace(/^\/+/, '');
  const lastSlash = relative.lastIndexOf('/');
  return lastSlash === -1 ? '' : relative.slice(0, lastSlash);
}
