/**
 * Evaluates a single rule condition against a scanned item.
 * Pure: the reference time and kind table come in through the context.
 */
import { longestMatchingExtension } from '../../utils/string.js';
import type { Condition, KindTable } from '../rules/types.js';
import type { Item } from '../scanner/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Context for condition evaluation.
 */
export interface EvaluationContext {
  /** "Now" for created_within_days windows */
  referenceTime: Date;
  kinds: KindTable;
}

function matchesKind(kind: string, item: Item, kinds: KindTable): boolean {
  if (kind === 'folder') {
    return item.isDirectory;
  }
  if (kind === 'alias' || kind === 'symlink') {
    return item.isSymlink;
  }
  if (item.isDirectory) {
    return false;
  }
  const extensions = kinds.get(kind);
  return extensions !== undefined && longestMatchingExtension(item.name, extensions) !== null;
}

/**
 * Returns true when the condition holds for the item.
 * Unsupported conditions never hold.
 */
export function evaluateCondition(
  condition: Condition,
  item: Item,
  context: EvaluationContext
): boolean {
  switch (condition.type) {
    case 'extension_any':
      return !item.isDirectory && longestMatchingExtension(item.name, condition.value) !== null;

    case 'name_contains': {
      const lowerName = item.name.toLowerCase();
      return condition.value.some((part) => part !== '' && lowerName.includes(part));
    }

    case 'kind':
      return matchesKind(condition.value, item, context.kinds);

    case 'created_within_days': {
      const threshold = context.referenceTime.getTime() - condition.value * DAY_MS;
      return item.createdAt.getTime() >= threshold;
    }

    case 'size_gte':
      return item.sizeBytes >= condition.value;

    case 'size_lte':
      return item.sizeBytes <= condition.value;

    case 'is_folder':
      return item.isDirectory === condition.value;

    case 'is_alias':
      return item.isSymlink === condition.value;

    case 'has_tag':
      return item.hasTag === condition.value;

    case 'unsupported':
      return false;

    default: {
      const unreachable: never = condition;
      return unreachable;
    }
  }
}
