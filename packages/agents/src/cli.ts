#!/usr/bin/env node
// stockdesk - command line entry point
//
// Usage:
//   stockdesk analyze AAPL 2024-05-10                         # default specialists
//   stockdesk analyze NVDA 2024-05-10 --analysts market,news  # subset (valuation always runs)
//   stockdesk analyze MSFT 2024-05-10 --json                  # full run snapshot as JSON
//   stockdesk migrate                                         # apply Postgres memory migrations
//   stockdesk --help                                          # usage

import 'dotenv/config';
import { pathToFileURL } from 'node:url';
import { loadConfig, parseSpecialistList, type StockdeskConfig } from '../config/index.js';
import { createOrchestrator } from '../orchestrator/factory.js';
import { ConfigurationError } from '../orchestrator/errors.js';
import { SELECTABLE_SPECIALISTS, SPECIALIST_LABELS, STAGE_KEYS, type SpecialistKind } from '../types/agents.js';
import type { RunSnapshot } from '../types/analysis.js';
import type { DomainEvent } from '../types/events.js';
import { isRecord } from '../utils/json.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── Argument parsing ────────────────────────────────────────────────

export interface AnalyzeArgs {
  ticker: string;
  asOf: string;
  specialists?: SpecialistKind[];
  json: boolean;
  help: boolean;
}

/** Parse `analyze` arguments; throws ConfigurationError on unknown flags or specialists */
export function parseAnalyzeArgs(args: readonly string[]): AnalyzeArgs {
  const positional: string[] = [];
  let specialists: SpecialistKind[] | undefined;
  let json = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      json = true;
    } else if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg === '--analysts' || arg.startsWith('--analysts=')) {
      const value = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : args[++i];
      if (value === undefined) {
        throw new ConfigurationError('--analysts needs a comma-separated list', ['--analysts: missing value']);
      }
      const { kinds, unknown } = parseSpecialistList(value);
      if (unknown.length > 0) {
        throw new ConfigurationError(
          `Unknown specialists: ${unknown.join(', ')}. Valid: ${SELECTABLE_SPECIALISTS.join(', ')}`,
          unknown.map(u => `--analysts: unknown specialist "${u}"`),
        );
      }
      specialists = kinds;
    } else if (arg.startsWith('-')) {
      throw new ConfigurationError(`Unknown option ${arg}`, [`${arg}: unknown option`]);
    } else {
      positional.push(arg);
    }
  }

  const [ticker = '', asOf = ''] = positional;
  if (!help && positional.length !== 2) {
    throw new ConfigurationError(
      'Expected exactly two arguments: <TICKER> <YYYY-MM-DD>',
      [`arguments: got ${positional.length}`],
    );
  }
  return { ticker, asOf, specialists, json, help };
}

// ── Output ──────────────────────────────────────────────────────────

function formatMs(ms: number | undefined): string {
  return ms === undefined ? '-' : `${(ms / 1000).toFixed(1)}s`;
}

function progressLine(event: DomainEvent): string | null {
  const p = isRecord(event.payload) ? event.payload : {};
  switch (event.type) {
    case 'SpecialistStarted':
      return `${c('magenta', '[specialist]')} ${c('dim', `${String(p.label)} started`)}`;
    case 'SpecialistCompleted':
      return `${c('magenta', '[specialist]')} ${c('dim', `${String(p.specialist)} published ${String(p.chars)} chars (${String(p.reviewStatus)})`)}`;
    case 'ToolFailed':
      return `${c('yellow', '[tool]')} ${c('dim', `${String(p.toolName)} failed: ${String(p.error)}`)}`;
    case 'GateReleased':
      return `${c('magenta', '[gate]')} ${c('dim', `released with ${Array.isArray(p.stages) ? p.stages.length : 0} reports`)}`;
    case 'AggregationCompleted':
      return `${c('magenta', '[pm]')} ${c('dim', `${String(p.direction)} composite ${String(p.compositeScore)}`)}`;
    case 'RiskAdjusted':
      return `${c('magenta', '[risk]')} ${c('dim', `${String(p.finalRecommendation)} at ${String(p.adjustedConviction)}`)}`;
    default:
      return null;
  }
}

export function renderSummary(snapshot: RunSnapshot): string {
  const lines: string[] = [];
  const decision = snapshot.finalDecision;
  const aggregate = snapshot.investmentPlan?.aggregate;

  lines.push('');
  lines.push(`  ${c('bold', `${snapshot.ticker} as of ${snapshot.asOf}`)} ${c('dim', `run ${snapshot.runId}`)}`);
  if (decision) {
    const color = decision.finalRecommendation === 'Buy' ? 'green' : decision.finalRecommendation === 'Sell' ? 'red' : 'yellow';
    lines.push(`  ${c(color, decision.finalRecommendation)} ${c('dim', '|')} conviction ${decision.adjustedConviction.toFixed(2)} ${c('dim', `(base ${decision.originalConviction.toFixed(2)}, risk ${decision.riskLevel})`)}`);
  }
  if (aggregate) {
    lines.push(`  ${c('dim', `PM composite ${aggregate.compositeScore.toFixed(4)} | threshold ${aggregate.threshold} | bull ${aggregate.bullishStrength.toFixed(4)} | bear ${aggregate.bearishStrength.toFixed(4)} | hold ${aggregate.holdStrength.toFixed(4)}`)}`);
  }
  lines.push('');

  for (const kind of snapshot.selected) {
    const output = snapshot.stages[STAGE_KEYS[kind]];
    const label = SPECIALIST_LABELS[kind].padEnd(22, ' ');
    const elapsed = formatMs(snapshot.timings[kind]?.elapsedMs);
    if (!output) {
      lines.push(`    ${c('cyan', label)} ${c('dim', 'no report')}`);
    } else if (output.verdict) {
      lines.push(`    ${c('cyan', label)} ${output.verdict.recommendation} ${output.verdict.conviction.toFixed(2)} ${c('dim', `${output.reviewStatus}, ${elapsed}`)}`);
    } else {
      lines.push(`    ${c('cyan', label)} ${c('yellow', 'unparsed')} ${c('dim', `${output.reviewStatus}, ${elapsed}`)}`);
    }
  }

  if (decision?.explanation) {
    lines.push('');
    lines.push(`  ${decision.explanation}`);
  }

  if (snapshot.warnings.length > 0) {
    lines.push('');
    lines.push(`  ${c('yellow', `${snapshot.warnings.length} warning(s):`)}`);
    for (const warning of snapshot.warnings) lines.push(`    ${c('dim', '●')} ${warning}`);
  }

  lines.push('');
  lines.push(`  ${c('dim', `Timings: gate ${formatMs(snapshot.timings.join_gate?.elapsedMs)} | pm ${formatMs(snapshot.timings.portfolio_manager?.elapsedMs)} | risk ${formatMs(snapshot.timings.risk_manager?.elapsedMs)} | total ${formatMs(snapshot.timings.total?.elapsedMs)}`)}`);
  lines.push('');
  return lines.join('\n');
}

// ── CLI class ───────────────────────────────────────────────────────

class StockdeskCli {
  async start(rawArgs: readonly string[]): Promise<number> {
    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h' || rawArgs[0] === 'help') {
      this.printHelp();
      return 0;
    }

    const [command, ...rest] = rawArgs;
    switch (command) {
      case 'analyze':
        return this.handleAnalyze(rest);
      case 'migrate':
        return this.handleMigrate();
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        return 1;
    }
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(args: readonly string[]): Promise<number> {
    const parsed = parseAnalyzeArgs(args);
    if (parsed.help) {
      this.printAnalyzeHelp();
      return 0;
    }

    const config: StockdeskConfig = loadConfig();
    const orchestrator = await createOrchestrator(config, {
      onEvent: parsed.json ? undefined : (event) => {
        const line = progressLine(event);
        if (line) process.stderr.write(`  ${line}\n`);
      },
    });

    if (!parsed.json) {
      console.log(`\n  ${c('bold', 'stockdesk')} ${c('dim', '- multi-specialist equity analysis')}`);
      console.log(`  ${c('dim', `Models: ${config.quickModel} / ${config.deepModel} | Memory: ${config.memoryBackend}`)}\n`);
    }

    const snapshot = await orchestrator.analyze(parsed.ticker, parsed.asOf, { specialists: parsed.specialists });

    if (parsed.json) {
      console.log(JSON.stringify(snapshot, null, 2));
    } else {
      console.log(renderSummary(snapshot));
    }
    return 0;
  }

  // ── Subcommand: migrate ─────────────────────────────────────────

  private async handleMigrate(): Promise<number> {
    const { runMigrations, closePool } = await import('../db/pg-client.js');
    try {
      const ran = await runMigrations();
      console.log(`  ${c('green', '✓')} ${ran.length === 0 ? 'Schema up to date' : `Applied ${ran.join(', ')}`}`);
      return 0;
    } finally {
      await closePool();
    }
  }

  // ── Help screens ────────────────────────────────────────────────

  private printHelp(): void {
    console.log(`
  ${c('bold', 'stockdesk')} - multi-specialist equity analysis

  ${c('bold', 'Usage:')}
    stockdesk analyze <TICKER> <YYYY-MM-DD> [options]   Run one analysis
    stockdesk migrate                                   Apply Postgres memory migrations
    stockdesk --help                                    Show this help

  ${c('bold', 'Examples:')}
    stockdesk analyze AAPL 2024-05-10
    stockdesk analyze NVDA 2024-05-10 --analysts market,news --json
`);
  }

  private printAnalyzeHelp(): void {
    console.log(`
  ${c('bold', 'stockdesk analyze')} - run the specialists, PM aggregation and risk review

  ${c('bold', 'Usage:')}
    stockdesk analyze <TICKER> <YYYY-MM-DD> [options]

  ${c('bold', 'Options:')}
    --analysts <a,b,...>          Specialists to run: ${SELECTABLE_SPECIALISTS.join(', ')}
                                  (valuation always runs alongside)
    --json                        Print the run snapshot as JSON
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required.
    FMP_API_KEY                   Required for market data.
    STOCKDESK_QUICK_MODEL         Specialists and self-consistency review.
    STOCKDESK_DEEP_MODEL          PM narrative and risk manager.
    STOCKDESK_MEMORY_BACKEND      local (default) or postgres.
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntryPoint()) {
  new StockdeskCli().start(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      if (err instanceof ConfigurationError) {
        console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
      } else {
        console.error(`${c('red', 'Fatal:')} ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exitCode = 1;
    },
  );
}
