// Base analyst - gather, clip, draft, review, publish
// All specialist agents extend this class

import { randomUUID } from 'node:crypto';
import {
  SPECIALIST_LABELS, STAGE_KEYS,
  type SpecialistKind, type SpecialistOutput, type ToolInvocation,
} from '../types/agents.js';
import type { DomainEvent, DomainEventType, EventBus } from '../types/events.js';
import type { AnalysisRun } from '../orchestrator/run-context.js';
import type { MarketDataProvider, FinancialBundle } from '../utils/market-data.js';
import { errorPayload, isErrorPayload } from '../utils/market-data.js';
import type { VerdictProducer } from '../utils/verdict-producer.js';
import { extractJsonObject } from '../utils/json.js';
import { CLIP_BUDGETS, clipText } from '../utils/clip-text.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { checkVerdictConsistency, parseVerdict, VERDICT_ADJUSTABLE_KEYS } from '../utils/verdict-schema.js';
import type { SelfConsistencyReviewer, ReviewStatus } from './self-consistency.js';
import { outputFormatInstructions, specialistSystemPrompt } from './prompts.js';

export interface AnalystSettings {
  marketLookbackDays: number;
  newsLookbackDays: number;
  indicatorLookbackDays: number;
  maxTokens: number;
}

export interface AnalystContext {
  run: AnalysisRun;
  provider: MarketDataProvider;
  producer: VerdictProducer;
  reviewer: SelfConsistencyReviewer;
  eventBus: EventBus;
  settings: AnalystSettings;
}

/** Clipped payload sections keyed by name, serialised into the prompt as one JSON object */
export type AnalystPayload = Record<string, unknown>;

export interface GatherState {
  payload: AnalystPayload;
  invocations: ToolInvocation[];
  warnings: string[];
}

const BUNDLE_TOOLS: ReadonlyArray<readonly [keyof FinancialBundle, string]> = [
  ['fundamentals', 'get_fundamentals'],
  ['balanceSheet', 'get_balance_sheet'],
  ['cashflow', 'get_cashflow'],
  ['incomeStatement', 'get_income_statement'],
];

export abstract class BaseAnalyst {
  readonly kind: SpecialistKind;
  readonly label: string;
  protected readonly logger: Logger;

  constructor(kind: SpecialistKind) {
    this.kind = kind;
    this.label = SPECIALIST_LABELS[kind];
    this.logger = createLogger(`Agent: ${this.label}`);
  }

  get stageKey(): string {
    return STAGE_KEYS[this.kind];
  }

  /** Role description placed ahead of the output-format block */
  protected abstract readonly role: string;

  protected readonly isValuation: boolean = false;

  /** Fetch and clip this specialist's inputs; every fetch goes through call() */
  protected abstract gather(ctx: AnalystContext, state: GatherState): Promise<AnalystPayload>;

  protected abstract humanPrompt(ticker: string, asOf: string, payloadJson: string): string;

  async execute(ctx: AnalystContext): Promise<SpecialistOutput> {
    const { run } = ctx;
    run.timer.start(this.kind);
    this.emit(ctx, 'SpecialistStarted', { specialist: this.kind, label: this.label });

    const state: GatherState = { payload: {}, invocations: [], warnings: [] };
    let output: SpecialistOutput;
    try {
      state.payload = await this.gather(ctx, state);
      output = await this.produce(ctx, state);
    } catch (err) {
      output = this.degraded(state, `specialist failed: ${errorMessage(err)}`);
    }

    this.logger.info(`Generated ${this.stageKey} for ${run.ticker}: ${output.raw.length} chars`, {
      reviewStatus: output.reviewStatus,
      warnings: output.warnings.length,
    });
    for (const warning of output.warnings) run.addWarning(`${this.label}: ${warning}`);

    run.publish(this.kind, output);
    run.timer.end(this.kind);
    this.emit(ctx, 'SpecialistCompleted', {
      specialist: this.kind,
      chars: output.raw.length,
      reviewStatus: output.reviewStatus,
      degraded: output.error !== undefined,
    });
    return output;
  }

  private async produce(ctx: AnalystContext, state: GatherState): Promise<SpecialistOutput> {
    const { run, settings } = ctx;
    const payloadJson = JSON.stringify(state.payload);

    let draftText: string;
    try {
      draftText = await ctx.producer.complete({
        system: specialistSystemPrompt(
          this.role, run.ticker, run.asOf, outputFormatInstructions(this.label, this.isValuation),
        ),
        prompt: this.humanPrompt(run.ticker, run.asOf, payloadJson),
        maxTokens: settings.maxTokens,
      });
    } catch (err) {
      return this.degraded(state, `verdict producer failed: ${errorMessage(err)}`);
    }

    if (!draftText.trim()) {
      return this.degraded(state, 'verdict producer returned empty output');
    }

    const draft = extractJsonObject(draftText);
    let raw: string;
    let reviewStatus: ReviewStatus;
    if (!draft) {
      // Published as-is; aggregation drops what it cannot parse
      raw = draftText;
      reviewStatus = 'fallback';
      state.warnings.push('draft verdict is not a JSON object; review skipped');
    } else {
      const review = await ctx.reviewer.review(draft, {
        label: this.label,
        adjustableKeys: VERDICT_ADJUSTABLE_KEYS,
        parse: value => {
          const result = parseVerdict(value);
          return result.ok ? result.verdict : null;
        },
        isConsistent: verdict => checkVerdictConsistency(verdict).length === 0,
        maxTokens: settings.maxTokens,
      });
      raw = JSON.stringify(review.value);
      reviewStatus = review.status;
      if (review.status === 'fallback' && review.reason) {
        state.warnings.push(`self-consistency review fell back to draft (${review.reason})`);
      }
    }

    const parsed = parseVerdict(extractJsonObject(raw));
    if (parsed.ok) {
      for (const issue of checkVerdictConsistency(parsed.verdict)) {
        state.warnings.push(`inconsistent verdict accepted as-is: ${issue}`);
      }
    } else {
      state.warnings.push(`verdict does not match schema: ${parsed.issues.slice(0, 3).join('; ')}`);
    }

    return {
      kind: this.kind,
      label: this.label,
      raw,
      verdict: parsed.ok ? parsed.verdict : null,
      reviewStatus,
      toolInvocations: state.invocations,
      warnings: state.warnings,
      completedAt: new Date(),
    };
  }

  /** Non-empty error report so the join gate is never starved */
  private degraded(state: GatherState, error: string): SpecialistOutput {
    this.logger.warn('Publishing degraded output', { error });
    state.warnings.push(error);
    return {
      kind: this.kind,
      label: this.label,
      raw: JSON.stringify({ analyst: this.label, error }),
      verdict: null,
      reviewStatus: 'not_run',
      toolInvocations: state.invocations,
      warnings: state.warnings,
      error,
      completedAt: new Date(),
    };
  }

  /**
   * Safe fetch wrapper: logs, emits tool events and turns a rejection into an
   * error payload. The returned value is whatever the provider produced.
   */
  protected async call(
    ctx: AnalystContext,
    state: GatherState,
    toolName: string,
    params: Record<string, unknown>,
    fn: () => Promise<unknown>,
  ): Promise<unknown> {
    const ticker = ctx.run.ticker;
    const extra = Object.entries(params)
      .filter(([key]) => key !== 'ticker')
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');
    this.logger.debug(`Calling ${toolName} for ${ticker}${extra ? ` ${extra}` : ''}`);

    const invocation: ToolInvocation = {
      invocationId: randomUUID(),
      specialist: this.kind,
      toolName,
      params,
      timestamp: new Date(),
    };
    this.emit(ctx, 'ToolCalled', { specialist: this.kind, toolName, params, invocationId: invocation.invocationId });

    const start = Date.now();
    let result: unknown;
    try {
      result = await fn();
    } catch (err) {
      result = errorPayload(toolName, err, { ticker, ...params });
    }
    invocation.duration = Date.now() - start;
    invocation.result = result;

    if (isErrorPayload(result)) {
      invocation.error = result.error;
      state.warnings.push(`${toolName} failed: ${result.error}`);
      this.logger.warn(`${toolName} for ${ticker} returned an error payload`, { error: result.error });
      this.emit(ctx, 'ToolFailed', { invocationId: invocation.invocationId, toolName, error: result.error });
    } else {
      this.emit(ctx, 'ToolSucceeded', { invocationId: invocation.invocationId, toolName, duration: invocation.duration });
    }

    state.invocations.push(invocation);
    return result;
  }

  /** The four correlated statements, fetched concurrently */
  protected async fetchFinancialBundle(ctx: AnalystContext, state: GatherState): Promise<FinancialBundle> {
    const { provider, run } = ctx;
    const { ticker, asOf } = run;
    const [fundamentals, balanceSheet, cashflow, incomeStatement] = await Promise.all([
      this.call(ctx, state, 'get_fundamentals', { ticker, asOf }, () => provider.getFundamentals(ticker, asOf)),
      this.call(ctx, state, 'get_balance_sheet', { ticker, freq: 'quarterly', asOf },
        () => provider.getBalanceSheet(ticker, 'quarterly', asOf)),
      this.call(ctx, state, 'get_cashflow', { ticker, freq: 'quarterly', asOf },
        () => provider.getCashflow(ticker, 'quarterly', asOf)),
      this.call(ctx, state, 'get_income_statement', { ticker, freq: 'quarterly', asOf },
        () => provider.getIncomeStatement(ticker, 'quarterly', asOf)),
    ]);
    return { fundamentals, balanceSheet, cashflow, incomeStatement };
  }

  /** Bundle through the run's shared cache; at most one fetch per (ticker, asOf) */
  protected async sharedFinancials(ctx: AnalystContext, state: GatherState): Promise<FinancialBundle> {
    const { run } = ctx;
    try {
      return await run.fetchCache.acquireOrFetch(
        run.ticker,
        run.asOf,
        () => this.fetchFinancialBundle(ctx, state),
        this.label,
        (outcome, entry) => {
          if (outcome === 'fetched') return;
          this.logger.info(`Using cached financial data for ${run.ticker} (from ${entry.ownerLabel})`, { outcome });
          // readers repeat the owner's fetch warnings
          for (const [field, toolName] of BUNDLE_TOOLS) {
            const payload = entry[field];
            if (isErrorPayload(payload)) state.warnings.push(`${toolName} failed: ${payload.error}`);
          }
        },
      );
    } catch (err) {
      const failed = errorPayload('get_financial_bundle', err, { ticker: run.ticker, asOf: run.asOf });
      state.warnings.push(`financial bundle unavailable: ${failed.error}`);
      return { fundamentals: failed, balanceSheet: failed, cashflow: failed, incomeStatement: failed };
    }
  }

  protected emit(ctx: AnalystContext, type: DomainEventType, payload: Record<string, unknown>): void {
    const event: DomainEvent = {
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      runId: ctx.run.runId,
      payload,
    };
    ctx.eventBus.emit(event);
  }
}

/** Clip the four statements of a bundle under the statement budget */
export function clipStatements(bundle: FinancialBundle): AnalystPayload {
  return {
    fundamentals: clipText(bundle.fundamentals, 'fundamentals', CLIP_BUDGETS.statement),
    balance_sheet: clipText(bundle.balanceSheet, 'balance_sheet', CLIP_BUDGETS.statement),
    cashflow: clipText(bundle.cashflow, 'cashflow', CLIP_BUDGETS.statement),
    income_statement: clipText(bundle.incomeStatement, 'income_statement', CLIP_BUDGETS.statement),
  };
}
