import type { Command } from 'commander';
import chalk from 'chalk';
import { PhaseAbortedError } from '../errors.js';
import { SessionStore } from '../session.js';
import { DebateSystem } from '../system.js';
import type { Scenario, WorkerKind } from '../types.js';
import type { Transport } from '../coordinator.js';
import { CLIError, createRenderer, formatResult, loadConfigOrFail, parseKinds } from './helpers.js';

interface DebateCommandOptions {
  country: string;
  story: string;
  rule: string;
  kinds?: WorkerKind[];
  transport?: string;
  config?: string;
  json?: boolean;
  save?: boolean;
  verbose?: boolean;
}

function parseTransport(value: string | undefined): Transport | undefined {
  if (value === undefined) return undefined;
  if (value === 'direct' || value === 'bus') return value;
  throw new CLIError(chalk.red(`Unknown transport "${value}" (expected direct or bus)`));
}

export function registerDebateCommand(program: Command): void {
  program
    .command('debate')
    .description('Run the three-phase debate over one scenario')
    .requiredOption('-c, --country <country>', 'Country the scenario takes place in')
    .requiredOption('-s, --story <story>', 'Scenario narrative')
    .requiredOption('-r, --rule <rule>', 'Rule of thumb guiding the judgement')
    .option('-k, --kinds <kinds>', 'Comma-separated worker kinds (default: config participants)', parseKinds)
    .option('-t, --transport <mode>', 'Request transport: direct or bus')
    .option('--config <path>', 'Config file (default: ./agora.yaml, then ~/.agora/config.yaml)')
    .option('--json', 'Print the result as JSON')
    .option('--save', 'Persist phases under the session directory')
    .option('-v, --verbose', 'Show pool and warning events')
    .action(async (opts: DebateCommandOptions) => {
      const loaded = await loadConfigOrFail(opts.config);
      const transport = parseTransport(opts.transport);
      const config = transport ? { ...loaded, debate: { ...loaded.debate, transport } } : loaded;

      const system = new DebateSystem(config, {
        onEvent: createRenderer({ verbose: opts.verbose, quiet: opts.json }),
      });
      const scenario: Scenario = { country: opts.country.toLowerCase(), story: opts.story, ruleOfThumb: opts.rule };

      system.start();
      try {
        const result = await system.runDebate(scenario, opts.kinds);
        if (opts.save) {
          const context = system.coordinator.getContext(result.conversationId);
          const store = new SessionStore(result.conversationId, config.sessionDir);
          if (context) await store.writeContext(context);
          await store.writeResult(result);
          if (!opts.json) console.error(chalk.dim(`  Session saved to ${store.path}`));
        }
        console.log(opts.json ? JSON.stringify(result, null, 2) : formatResult(result));
      } catch (err) {
        if (!(err instanceof PhaseAbortedError)) throw err;
        if (opts.save) {
          const context = system.coordinator.getContext(err.conversationId);
          if (context) await new SessionStore(err.conversationId, config.sessionDir).writeContext(context);
        }
        if (opts.json) {
          console.log(JSON.stringify({ conversationId: err.conversationId, error: err.message, aggregate: err.aggregate }, null, 2));
        }
        throw new CLIError(opts.json ? '' : chalk.red(err.message), 2);
      } finally {
        await system.shutdown();
      }
    });
}
