/**
 * Path Variant Generation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  cp437Corruption,
  encodeExistPath,
  generatePathVariants,
  latin1Corruption,
  percentEncodePath,
} from '../../../normalization/path-variants.js';
import { normalizePath } from '../../../normalization/path-normalizer.js';

describe('encoders', () => {
  it('hex-escapes the pipe character', () => {
    expect(encodeExistPath('db/c/A|B|C.xml')).toBe('db/c/A&7C;B&7C;C.xml');
  });

  it('percent-encodes everything but unreserved characters and slashes', () => {
    expect(percentEncodePath("db/c/A B(1)!'*.xml")).toBe('db/c/A%20B%281%29%21%27%2A.xml');
  });

  it('misreads UTF-8 as Latin-1 and CP437', () => {
    expect(latin1Corruption('Müller')).toBe('MÃ¼ller');
    expect(cp437Corruption('Müller')).toBe('M├╝ller');
  });
});

describe('generatePathVariants', () => {
  it('starts with the raw path, then the normalized path', () => {
    const variants = generatePathVariants('db/c/A|B.xml', 'db/c/A%7CB.xml');
    expect(variants).toEqual(['db/c/A%7CB.xml', 'db/c/A|B.xml', 'db/c/A&7C;B.xml']);
  });

  it('lists encoding misreadings of non-ASCII paths in order', () => {
    expect(generatePathVariants('db/c/Müller.xml')).toEqual([
      'db/c/Müller.xml',
      'db/c/M%C3%BCller.xml',
      'db/c/M├╝ller.xml',
      'db/c/MÃ¼ller.xml',
    ]);
  });

  it('includes hex-escaped misreadings when they differ', () => {
    const variants = generatePathVariants('db/c/Ä|B.xml');
    expect(variants).toEqual([
      'db/c/Ä|B.xml',
      'db/c/Ä&7C;B.xml',
      'db/c/%C3%84%7CB.xml',
      'db/c/├ä|B.xml',
      'db/c/├ä&7C;B.xml',
      'db/c/Ã\u0084|B.xml',
      'db/c/Ã\u0084&7C;B.xml',
    ]);
  });

  it('never repeats a variant', () => {
    const variants = generatePathVariants('db/c/plain.xml', 'db/c/plain.xml');
    expect(variants).toEqual(['db/c/plain.xml']);
  });

  it('every variant normalizes back to the identity for escape-only encodings', () => {
    const normalized = 'db/c/A|B Müller.xml';
    const [, exist, percent] = generatePathVariants(normalized);
    expect(normalizePath(exist)).toBe(normalized);
    expect(normalizePath(percent)).toBe(normalized);
  });
});
