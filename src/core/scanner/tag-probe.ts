/**
 * Tag probes: detect OS-level user tags on filesystem entries.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { TagProbe } from './types.js';

const execFileAsync = promisify(execFile);

/** Extended attribute Finder uses for user tags. */
export const FINDER_TAG_ATTRIBUTE = 'com.apple.metadata:_kMDItemUserTags';

/**
 * Probe for platforms without tag support. Never reports a tag.
 */
export class NoopTagProbe implements TagProbe {
  readonly available = false;

  async hasTag(): Promise<boolean> {
    return false;
  }
}

/**
 * macOS probe: lists extended attribute names with the system `xattr` tool.
 */
export class XattrTagProbe implements TagProbe {
  readonly available = true;

  constructor(private readonly command: string = '/usr/bin/xattr') {}

  async hasTag(filePath: string): Promise<boolean> {
    try {
      const { stdout } = await execFileAsync(this.command, [filePath], { encoding: 'utf-8' });
      return stdout.split('\n').some((line) => line.trim() === FINDER_TAG_ATTRIBUTE);
    } catch {
      // No readable attributes: untagged
      return false;
    }
  }
}

/**
 * Pick the probe for the running platform.
 */
export function createTagProbe(platform: NodeJS.Platform = process.platform): TagProbe {
  return platform === 'darwin' ? new XattrTagProbe() : new NoopTagProbe();
}
