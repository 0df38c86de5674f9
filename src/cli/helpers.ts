import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../config.js';
import type { AgoraConfig } from '../config-schema.js';
import { ConfigError } from '../errors.js';
import type { BatchSummary } from '../batch.js';
import { ANSWERS, isWorkerKind, type DebateResult, type EventSink, type WorkerKind } from '../types.js';

export class CLIError extends Error {
  constructor(message: string, public exitCode: number = 1) {
    super(message);
    this.name = 'CLIError';
  }
}

export async function loadConfigOrFail(path?: string): Promise<AgoraConfig> {
  try {
    const { config } = await loadConfig({ path });
    return config;
  } catch (err) {
    if (err instanceof ConfigError) throw new CLIError(chalk.red(`Config error: ${err.message}`));
    throw err;
  }
}

export function parseKinds(value: string): WorkerKind[] {
  const kinds = value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const unknown = kinds.filter((k) => !isWorkerKind(k));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(`Unknown worker kind(s): ${unknown.join(', ')}`);
  }
  return kinds.filter(isWorkerKind);
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  return n;
}

// ============================================================================
// Event rendering
// ============================================================================

function fields(data: unknown): Record<string, unknown> {
  return typeof data === 'object' && data !== null ? Object.fromEntries(Object.entries(data)) : {};
}

const text = (v: unknown): string => (typeof v === 'string' ? v : v === undefined || v === null ? '' : String(v));
const secs = (v: unknown): string => (typeof v === 'number' ? (v / 1000).toFixed(1) : '?');

export interface RendererOptions {
  verbose?: boolean;
  /** Silences everything; stdout is reserved for the JSON document. */
  quiet?: boolean;
  write?: (chunk: string) => void;
}

/** Progress lines on stderr. Debug-level events only with verbose. */
export function createRenderer(options: RendererOptions = {}): EventSink {
  const write = options.write ?? ((chunk: string) => process.stderr.write(chunk));
  const verbose = options.verbose ?? false;

  return (event, data) => {
    if (options.quiet) return;
    const d = fields(data);
    switch (event) {
      case 'phase':
        write(chalk.bold(`  ▸ ${text(d.phase)} `));
        break;
      case 'response':
        write(`${chalk.green('✓')}${chalk.dim(text(d.kind))} `);
        break;
      case 'phase:done': {
        const failed = typeof d.failed === 'number' && d.failed > 0 ? chalk.yellow(` ${d.failed} failed`) : '';
        write(chalk.dim(`(${secs(d.duration)}s)`) + failed + '\n');
        break;
      }
      case 'debate:aborted':
        write(chalk.red(`\n  ✗ Aborted in ${text(d.phase)}: ${text(d.reason)}\n`));
        break;
      case 'debate:complete':
        write(chalk.dim(`  ⏱  ${secs(d.duration)}s total\n`));
        break;
      case 'batch:item': {
        const index = typeof d.index === 'number' ? d.index + 1 : '?';
        const outcome = d.error
          ? chalk.red(`error: ${text(d.error)}`)
          : `${chalk.bold(text(d.majority))} ${chalk.dim(`(gold: ${text(d.goldLabel) || '-'})`)}`;
        write(`[${index}/${text(d.total)}] ${text(d.id)} ${outcome} ${chalk.dim(`${secs(d.duration)}s`)}\n`);
        break;
      }
      case 'batch:checkpoint':
        write(chalk.dim(`  checkpoint: ${text(d.completed)} item(s) written\n`));
        break;
      case 'warn':
        if (verbose) write(chalk.yellow(`\n  ⚠ ${text(d.message)}\n`));
        break;
      case 'pool:load':
        if (verbose) write(chalk.dim(`\n  ⟳ loading ${text(d.kind)}\n`));
        break;
      case 'pool:evict':
        if (verbose) write(chalk.dim(`\n  ⇣ evicted ${text(d.kind)} (${text(d.reason)})\n`));
        break;
      default:
        if (verbose && event.startsWith('debate:')) write(chalk.dim(`  ${event}\n`));
        break;
    }
  };
}

// ============================================================================
// Result formatting
// ============================================================================

export function formatResult(result: DebateResult): string {
  const { scenario, aggregate } = result;
  const lines: string[] = [''];
  lines.push(chalk.bold(`  Scenario (${scenario.country})`));
  lines.push(chalk.dim(`  Rule of thumb: ${scenario.ruleOfThumb}`));
  lines.push('');

  const width = Math.max(...result.participants.map((k) => k.length));
  for (const kind of result.participants) {
    const initial = result.initialResponses[kind];
    const final = result.finalResponses[kind];
    const from = initial ? initial.parsedAnswer : chalk.red('failed');
    const to = final ? chalk.bold(final.parsedAnswer) : chalk.red('—');
    const confidence = final ? chalk.dim(` (${final.confidence.toFixed(2)})`) : '';
    lines.push(`  ${kind.padEnd(width)}  ${from} → ${to}${confidence}`);
  }

  lines.push('');
  const total = ANSWERS.reduce((sum, a) => sum + aggregate.counts[a], 0);
  const tally = ANSWERS.map((a) => `${a}=${aggregate.counts[a]}`).join(' ');
  lines.push(
    `  ${chalk.bold('Majority:')} ${chalk.cyan(aggregate.answer.toUpperCase())} ` +
      chalk.dim(`${aggregate.counts[aggregate.answer]}/${total}, ${tally}, confidence ${Math.round(aggregate.confidence * 100)}%`),
  );
  return lines.join('\n');
}

export function formatSummary(summary: BatchSummary): string {
  const lines: string[] = [''];
  lines.push(chalk.bold(`  Processed ${summary.processed} item(s), ${summary.failed} failed, ${secs(summary.duration)}s`));
  const { correct, total, rate } = summary.accuracy;
  if (total > 0) lines.push(`  Accuracy: ${correct}/${total} = ${rate.toFixed(3)}`);
  const kinds = Object.keys(summary.distribution).filter(isWorkerKind);
  if (kinds.length > 0) {
    lines.push('  Decision distribution:');
    for (const kind of kinds) {
      const counts = summary.distribution[kind];
      if (!counts) continue;
      const sum = ANSWERS.reduce((acc, a) => acc + counts[a], 0);
      lines.push(`    ${kind}: Yes=${counts.yes}, No=${counts.no}, Neither=${counts.neither} (total=${sum})`);
    }
  }
  return lines.join('\n');
}
