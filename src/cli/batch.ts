import type { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { loadScenarios, runBatch, writeResults } from '../batch.js';
import { DebateSystem } from '../system.js';
import { CLIError, createRenderer, formatSummary, loadConfigOrFail, parseCount } from './helpers.js';

interface BatchCommandOptions {
  output: string;
  maxItems?: number;
  startFrom: number;
  checkpointEvery: number;
  config?: string;
  verbose?: boolean;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Debate every scenario in a JSONL file and score the majority against gold labels')
    .argument('<input>', 'JSONL file with ID, Country, Story, Rule-of-Thumb and Gold Label fields')
    .option('-o, --output <path>', 'Where to write JSONL results', 'output/debate-results.jsonl')
    .option('--max-items <n>', 'Process at most n items', parseCount)
    .option('--start-from <n>', 'Skip the first n items', parseCount, 0)
    .option('--checkpoint-every <n>', 'Rewrite the output after every n items (0 disables)', parseCount, 10)
    .option('--config <path>', 'Config file (default: ./agora.yaml, then ~/.agora/config.yaml)')
    .option('-v, --verbose', 'Show phase progress, pool and warning events')
    .action(async (input: string, opts: BatchCommandOptions) => {
      if (!existsSync(input)) throw new CLIError(chalk.red(`Input not found: ${input}`));
      const config = await loadConfigOrFail(opts.config);
      const records = await loadScenarios(input);

      const render = createRenderer({ verbose: opts.verbose });
      const system = new DebateSystem(config, {
        // Per-phase progress is noise across hundreds of items unless asked for
        onEvent: (event, data) => {
          if (opts.verbose || event.startsWith('batch:')) render(event, data);
        },
      });

      system.start();
      try {
        const { results, summary } = await runBatch(system, records, {
          startFrom: opts.startFrom,
          maxItems: opts.maxItems,
          checkpointEvery: opts.checkpointEvery,
          onCheckpoint: (partial) => writeResults(opts.output, partial),
          onEvent: render,
        });
        await writeResults(opts.output, results);
        console.log(formatSummary(summary));
        console.log(chalk.dim(`  Results written to ${opts.output}`));
      } finally {
        await system.shutdown();
      }
    });
}
