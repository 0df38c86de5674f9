import type { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { CONFIG_PATH, LOCAL_CONFIG_NAME, defaultConfig, saveConfig } from '../config.js';
import { culturalSimilarity, loadPersonaTable } from '../personas.js';
import { CULTURAL_KINDS, WORKER_KINDS } from '../types.js';
import { CLIError } from './helpers.js';

export function registerConfigCommands(program: Command): void {
  program
    .command('init')
    .description('Write a config file with the default settings')
    .option('--local', `Write ./${LOCAL_CONFIG_NAME} instead of ${CONFIG_PATH}`)
    .option('--force', 'Overwrite an existing file')
    .action(async (opts: { local?: boolean; force?: boolean }) => {
      const path = opts.local ? join(process.cwd(), LOCAL_CONFIG_NAME) : CONFIG_PATH;
      if (existsSync(path) && !opts.force) {
        throw new CLIError(chalk.yellow(`${path} already exists (use --force to overwrite)`));
      }
      await saveConfig(defaultConfig(), path);
      console.log(chalk.green(`✅ Wrote ${path}`));
      console.log(chalk.dim('Set provider.provider / provider.model, or per-kind overrides under workers.'));
    });

  program
    .command('personas')
    .description('List worker kinds and their persona data')
    .option('--similarity', 'Also print the cultural similarity table')
    .action((opts: { similarity?: boolean }) => {
      const table = loadPersonaTable();
      console.log('');
      for (const kind of WORKER_KINDS) {
        const persona = table.personas.get(kind);
        if (!persona) continue;
        console.log(`  ${chalk.bold(kind)} ${chalk.dim(`(${persona.displayName})`)}`);
        if (persona.values.length > 0) console.log(chalk.dim(`    values: ${persona.values.join(', ')}`));
      }

      if (opts.similarity) {
        console.log('');
        const width = Math.max(...CULTURAL_KINDS.map((k) => k.length));
        const header = CULTURAL_KINDS.map((k) => k.replace('cultural_', '').slice(0, 6).padStart(7)).join('');
        console.log(`  ${''.padEnd(width)}${header}`);
        for (const a of CULTURAL_KINDS) {
          const row = CULTURAL_KINDS.map((b) => culturalSimilarity(a, b, table).toFixed(2).padStart(7)).join('');
          console.log(`  ${a.padEnd(width)}${row}`);
        }
      }
    });
}
