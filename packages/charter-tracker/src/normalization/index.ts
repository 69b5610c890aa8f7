export { normalizePath, decodeExistEscapes, extractParentPath } from './path-normalizer.js';
export {
  generatePathVariants,
  encodeExistPath,
  percentEncodePath,
  latin1Corruption,
  cp437Corruption,
} from './path-variants.js';
