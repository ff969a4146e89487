/**
 * Scanner type definitions.
 */

/**
 * One filesystem entry considered for tidying. Read once per scan.
 */
export interface Item {
  /** Absolute path */
  readonly path: string;
  /** Path relative to the scan root, forward slashes */
  readonly relativePath: string;
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isSymlink: boolean;
  /** 0 for directories */
  readonly sizeBytes: number;
  /** Modification time, used as the entry's age */
  readonly createdAt: Date;
  readonly hasTag: boolean;
}

export interface ScanOptions {
  /** Root to enumerate */
  sourceRoot: string;
  /** Where tidied items land; entries beneath it are never candidates */
  destinationRoot: string;
  /**
   * Extra subtrees to exclude, e.g. rule target folders when the
   * destination is the source itself.
   */
  excludedRoots?: string[];
  includeSubfolders: boolean;
  includeFolders: boolean;
  /** With includeFolders, only empty folders are candidates */
  includeEmptyFolders: boolean;
  ignoreFolders: boolean;
  ignoreAliases: boolean;
  /** Probe tags so has_tag conditions can match */
  includeTagged: boolean;
  ignoreTagged: boolean;
  skipBundles: boolean;
  /** Normalized extensions */
  ignoreExtensions: ReadonlySet<string>;
  /** Lowercased names, relative paths, gitignore patterns or absolute paths */
  ignorePaths: readonly string[];
}

export interface ScanResult {
  items: Item[];
  ignored: number;
}

/**
 * Capability-gated access to OS-level tags on filesystem entries.
 */
export interface TagProbe {
  /** Whether this probe can ever report a tag */
  readonly available: boolean;
  hasTag(filePath: string): Promise<boolean>;
}
