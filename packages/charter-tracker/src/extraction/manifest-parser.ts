/**
 * Manifest Descriptor Parser
 *
 * Every collection in a backup carries a `__contents__.xml` descriptor:
 *
 * ```xml
 * <collection xmlns="http://exist.sourceforge.net/NS/exist"
 *             name="/db/mom-data/metadata.charter.public/AT-StiAK">
 *   <resource type="XMLResource" name="1201_I_15.charter.xml" filename="..."/>
 *   <subcollection name="Urkunden" filename="Urkunden"/>
 * </collection>
 * ```
 *
 * Descriptors in real backups are frequently truncated or otherwise broken.
 * Parsing therefore returns a result value; callers skip failures.
 *
 * @module extraction/manifest-parser
 */

import { posix } from 'node:path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';

// ============================================================================
// Types
// ============================================================================

export interface ManifestDescriptor {
  /** Archive entry the descriptor was read from */
  readonly entryName: string;
  /** Declared collection path, leading and trailing separators stripped */
  readonly collectionPath: string;
  /** True when the path came from the archive location, not the `name` attribute */
  readonly pathFromLocation: boolean;
  /** `name` attributes of every resource element, in document order */
  readonly resourceNames: readonly string[];
}

export type ManifestParseResult =
  | { readonly ok: true; readonly descriptor: ManifestDescriptor }
  | { readonly ok: false; readonly entryName: string; readonly error: string };

type XmlNode = { readonly [key: string]: unknown };

// ============================================================================
// Parsing
// ============================================================================

const ATTRIBUTE_PREFIX = '@_';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  // Character references such as `&#246;` in resource names
  htmlEntities: true,
  isArray: (tagName) => tagName === 'resource',
});

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getAttribute(node: XmlNode, name: string): string | null {
  const value = node[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : null;
}

/**
 * Collect `name` attributes of all descendant `resource` elements
 */
function collectResourceNames(node: unknown, names: string[]): void {
  if (Array.isArray(node)) {
    for (const child of node) {
      collectResourceNames(child, names);
    }
    return;
  }
  if (!isXmlNode(node)) {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      continue;
    }
    if (key === 'resource') {
      const resources = Array.isArray(value) ? value : [value];
      for (const resource of resources) {
        const name = isXmlNode(resource) ? getAttribute(resource, 'name') : null;
        if (name) {
          names.push(name);
        }
      }
    }
    collectResourceNames(value, names);
  }
}

/**
 * Parse one manifest descriptor
 *
 * @param entryName - Archive entry name of the descriptor (used as path fallback)
 * @param xml - Descriptor content
 */
export function parseManifestDescriptor(entryName: string, xml: string): ManifestParseResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return {
      ok: false,
      entryName,
      error: `${validation.err.msg} (line ${validation.err.line})`,
    };
  }

  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    return {
      ok: false,
      entryName,
      error: error instanceof Error ? error.message : String(error),
    };
  }

  if (!isXmlNode(document)) {
    return { ok: false, entryName, error: 'descriptor has no root element' };
  }

  const rootKey = Object.keys(document).find((key) => !key.startsWith('#'));
  if (rootKey === undefined) {
    return { ok: false, entryName, error: 'descriptor has no root element' };
  }

  const root = document[rootKey];
  const rootNode = isXmlNode(root) ? root : {};

  const declaredPath = getAttribute(rootNode, 'name');
  const pathFromLocation = !declaredPath;
  let collectionPath = declaredPath
    ? declaredPath.startsWith('/')
      ? declaredPath.slice(1)
      : declaredPath
    : posix.dirname(entryName);
  collectionPath = collectionPath.replace(/\/+$/, '');

  const resourceNames: string[] = [];
  collectResourceNames(rootNode, resourceNames);

  return {
    ok: true,
    descriptor: { entryName, collectionPath, pathFromLocation, resourceNames },
  };
}
