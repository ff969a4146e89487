/**
 * Zod schema for the YAML configuration file.
 * Unknown keys are stripped; every section is optional.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't apply inner defaults for objects.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Rule mode, accepted case-insensitively. */
export const RuleModeSchema = z.preprocess(
  (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
  z.enum(['all', 'any'])
);

export const RawConditionSchema = z
  .object({
    type: z.string().trim().min(1),
    value: z.unknown(),
  })
  .refine((condition) => condition.value !== undefined, {
    message: 'condition.value is required',
    path: ['value'],
  });

/**
 * A user-defined rule. The shortcut fields are only read when
 * `conditions` is absent or empty.
 */
export const CustomRuleSchema = z.object({
  /** Used by the list form */
  id: z.union([z.string(), z.number()]).transform(String).optional(),
  description: z.string().optional(),
  subfolder: z.string().optional(),
  folder_name: z.string().optional(),
  enabled: z.boolean().default(true),
  mode: RuleModeSchema.optional(),
  conditions: z.array(RawConditionSchema).optional(),
  kind: z.unknown().optional(),
  name_contains: z.unknown().optional(),
  created_within_days: z.unknown().optional(),
  size_gte: z.unknown().optional(),
  size_lte: z.unknown().optional(),
  extensions: z.unknown().optional(),
});

export const IgnoreSectionSchema = z.object({
  extensions: z.array(z.string()).default([]),
  paths: z.array(z.string()).default([]),
  aliases: z.boolean().optional(),
  folders: z.boolean().optional(),
  tagged: z.boolean().optional(),
});

export const OptionsSectionSchema = z.object({
  include_subfolders: z.boolean().optional(),
  include_folders: z.boolean().optional(),
  include_empty_folders: z.boolean().optional(),
  include_tagged: z.boolean().optional(),
  skip_bundles: z.boolean().optional(),
  remove_empty_folders: z.boolean().optional(),
  create_dated_top_folder: z.boolean().optional(),
  extra_logging: z.boolean().optional(),
});

export const RulesSectionSchema = z.object({
  enable: z.array(z.string()).default([]),
  disable: z.array(z.string()).default([]),
  order: z.array(z.string()).default([]),
});

export const ConfigFileSchema = withDefaults(
  z.object({
    ignore: withDefaults(IgnoreSectionSchema),
    options: withDefaults(OptionsSectionSchema),
    rules: withDefaults(RulesSectionSchema),
    /** Rule reference -> replacement extension list */
    extension_rules: z.record(z.string(), z.array(z.string())).default({}),
    /** Rule reference -> replacement subfolder */
    subfolders: z.record(z.string(), z.string()).default({}),
    /** Keyed by id, or a list whose entries carry `id` */
    custom_rules: z
      .union([z.record(z.string(), CustomRuleSchema), z.array(CustomRuleSchema)])
      .optional(),
  })
);

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type CustomRuleConfig = z.infer<typeof CustomRuleSchema>;
