/**
 * Rule and condition type definitions.
 */

/** How a rule combines its conditions. */
export type RuleMode = 'all' | 'any';

export interface ExtensionAnyCondition {
  readonly type: 'extension_any';
  /** Normalized extensions (lowercase, leading dot) */
  readonly value: readonly string[];
}

export interface NameContainsCondition {
  readonly type: 'name_contains';
  /** Lowercased substrings */
  readonly value: readonly string[];
}

export interface KindCondition {
  readonly type: 'kind';
  /** `folder`, `alias`/`symlink`, or a key of the kind table */
  readonly value: string;
}

export interface CreatedWithinDaysCondition {
  readonly type: 'created_within_days';
  readonly value: number;
}

export interface SizeCondition {
  readonly type: 'size_gte' | 'size_lte';
  readonly value: number;
}

export interface FlagCondition {
  readonly type: 'is_folder' | 'is_alias' | 'has_tag';
  readonly value: boolean;
}

/**
 * A condition whose tag or value could not be understood. Never matches.
 */
export interface UnsupportedCondition {
  readonly type: 'unsupported';
  readonly tag: string;
  readonly value: unknown;
  readonly reason: string;
}

export type Condition =
  | ExtensionAnyCondition
  | NameContainsCondition
  | KindCondition
  | CreatedWithinDaysCondition
  | SizeCondition
  | FlagCondition
  | UnsupportedCondition;

export type ConditionType = Condition['type'];

/** Condition tags accepted from configuration. */
export const CONDITION_TAGS = [
  'extension_any',
  'name_contains',
  'kind',
  'created_within_days',
  'size_gte',
  'size_lte',
  'is_folder',
  'is_alias',
  'has_tag',
] as const;

export type ConditionTag = (typeof CONDITION_TAGS)[number];

export interface Rule {
  /** Normalized identifier, unique within a resolved rule set */
  readonly id: string;
  readonly description: string;
  /** Relative target folder, e.g. `Documents/PDF` */
  readonly subfolder: string;
  readonly enabled: boolean;
  readonly builtIn: boolean;
  readonly mode: RuleMode;
  readonly conditions: readonly Condition[];
}

/** Symbolic kind → normalized extension set. */
export type KindTable = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Adjustments applied on top of the built-in rule table.
 * Rule ids here are already resolved and normalized.
 */
export interface RuleOverrides {
  enable: ReadonlySet<string>;
  disable: ReadonlySet<string>;
  /** Replace a rule's conditions with a single extension_any */
  extensionOverrides: ReadonlyMap<string, readonly string[]>;
  subfolderOverrides: ReadonlyMap<string, string>;
  order: readonly string[];
  customRules: readonly Rule[];
}

/**
 * Id of the catch-all rule that always sorts last when priorities are optimized.
 * No built-in rule uses it and custom ids are prefixed, so the `fallback_mime`
 * counter only stays in the report to keep its format stable.
 */
export const FALLBACK_RULE_ID = 'mime_fallback';
