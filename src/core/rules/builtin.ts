/**
 * Built-in rule table and kind table, read from the bundled data files.
 * Tables are loaded once, frozen, and handed out as shared read-only values.
 */
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { readFileSync } from '../../utils/file-system.js';
import { parseYamlWithSchema } from '../../utils/yaml.js';
import { normalizeExtension } from '../../utils/string.js';
import { createCondition, createRule } from './conditions.js';
import type { KindTable, Rule } from './types.js';

const DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));
const BUILTIN_RULES_FILE = 'builtin-rules.yaml';
const KINDS_FILE = 'kinds.yaml';

const RawConditionSchema = z.object({
  type: z.string(),
  value: z.unknown(),
});

const BuiltinRuleSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  subfolder: z.string().min(1),
  enabled: z.boolean().default(true),
  mode: z.enum(['all', 'any']).default('all'),
  /** Shorthand for a single extension_any condition */
  extensions: z.array(z.string()).optional(),
  conditions: z.array(RawConditionSchema).optional(),
});

export const BuiltinRuleTableSchema = z.object({
  version: z.number().int().positive(),
  rules: z.array(BuiltinRuleSchema).min(1),
});

export const KindTableSchema = z.record(z.string(), z.array(z.string()));

export type BuiltinRuleTable = z.infer<typeof BuiltinRuleTableSchema>;

/**
 * Convert a parsed rule table into frozen built-in rules.
 */
export function buildRulesFromTable(table: BuiltinRuleTable): readonly Rule[] {
  const rules = table.rules.map((raw) => {
    const conditions = raw.conditions
      ? raw.conditions.map((c) => createCondition(c.type, c.value))
      : [];
    if (raw.extensions) {
      conditions.push(createCondition('extension_any', raw.extensions));
    }
    return createRule({
      id: raw.id,
      description: raw.description,
      subfolder: raw.subfolder,
      enabled: raw.enabled,
      builtIn: true,
      mode: raw.mode,
      conditions,
    });
  });
  return Object.freeze(rules);
}

/**
 * Convert a parsed kind table into a frozen lookup.
 */
export function buildKindTable(raw: Record<string, string[]>): KindTable {
  const table = new Map<string, ReadonlySet<string>>();
  for (const [kind, extensions] of Object.entries(raw)) {
    table.set(kind.trim().toLowerCase(), new Set(extensions.map(normalizeExtension)));
  }
  return table;
}

let cachedRules: readonly Rule[] | null = null;
let cachedKinds: KindTable | null = null;

/**
 * The shipped built-in rules, in priority order.
 */
export function getBuiltinRules(): readonly Rule[] {
  if (!cachedRules) {
    const content = readFileSync(`${DATA_DIR}${BUILTIN_RULES_FILE}`);
    cachedRules = buildRulesFromTable(parseYamlWithSchema(content, BuiltinRuleTableSchema));
  }
  return cachedRules;
}

/**
 * The shipped kind → extensions table.
 */
export function getKindTable(): KindTable {
  if (!cachedKinds) {
    const content = readFileSync(`${DATA_DIR}${KINDS_FILE}`);
    cachedKinds = buildKindTable(parseYamlWithSchema(content, KindTableSchema));
  }
  return cachedKinds;
}
