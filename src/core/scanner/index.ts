export {
  ItemScanner,
  scanItems,
  isBundleName,
  BUNDLE_SUFFIXES,
  DEFAULT_IGNORE_EXTENSIONS,
} from './scanner.js';
export type { ScannerDeps } from './scanner.js';
export { createIgnoreList } from './ignore-list.js';
export type { IgnoreList } from './ignore-list.js';
export { NoopTagProbe, XattrTagProbe, createTagProbe, FINDER_TAG_ATTRIBUTE } from './tag-probe.js';
export type { Item, ScanOptions, ScanResult, TagProbe } from './types.js';
