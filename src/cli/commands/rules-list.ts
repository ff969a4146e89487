/**
 * rules-list command: print the resolved, ordered rule set.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { getBuiltinRules } from '../../core/rules/builtin.js';
import { resolveRules } from '../../core/rules/catalog.js';
import type { Rule } from '../../core/rules/types.js';
import { expandHome } from '../../utils/file-system.js';
import { ExitCode, runCommand, type ExitCodeValue } from '../shared.js';

interface RulesListOptions {
  config?: string;
}

/**
 * `<id> <on|off> <[lock]|[custom]> <subfolder> :: <description>`
 */
export function formatRuleLine(rule: Rule): string {
  const lock = rule.builtIn ? '[lock]' : '[custom]';
  const state = rule.enabled ? 'on' : 'off';
  return `${rule.id.padEnd(16)} ${state.padEnd(3)} ${lock.padEnd(8)} ${rule.subfolder} :: ${rule.description}`;
}

/**
 * Create the rules-list command.
 */
export function createRulesListCommand(): Command {
  return new Command('rules-list')
    .description('List built-in and custom rules in matching order')
    .option('-c, --config <path>', 'YAML config file')
    .action(async (options: RulesListOptions) => {
      await runCommand(async () => runRulesList(options));
    });
}

export async function runRulesList(options: RulesListOptions): Promise<ExitCodeValue> {
  const config = await loadConfig(options.config ? expandHome(options.config) : undefined);
  const builtins = getBuiltinRules();
  const rules = resolveRules(builtins, config.overrides);

  console.log(
    chalk.bold(
      `RULE COUNT: ${rules.length} (built-in=${builtins.length} custom=${config.overrides.customRules.length})`
    )
  );
  for (const rule of rules) {
    const line = formatRuleLine(rule);
    console.log(rule.enabled ? line : chalk.dim(line));
  }
  return ExitCode.SUCCESS;
}
