// AnalysisRun - per-run context passed explicitly to every stage
// Owns the stage mapping (through the join gate), timers, fetch cache and decision records

import { randomUUID } from 'node:crypto';
import { STAGE_KEYS, type SpecialistKind, type SpecialistOutput } from '../types/agents.js';
import type {
  FinalDecision, InvestmentPlan, RunSnapshot, RunStatus, StageMapping,
} from '../types/analysis.js';
import { JoinGate } from './join-gate.js';
import { SharedFetchCache } from './shared-fetch-cache.js';
import { StageTimer, type Clock } from './stage-timer.js';
import { FrozenRunError, PipelineError } from './errors.js';

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  pending: ['running', 'failed'],
  running: ['aggregating', 'failed'],
  aggregating: ['risk_review', 'failed'],
  risk_review: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface AnalysisRunInit {
  ticker: string;
  asOf: string;
  selected: readonly SpecialistKind[];
  runId?: string;
  clock?: Clock;
}

export class AnalysisRun {
  readonly runId: string;
  readonly ticker: string;
  readonly asOf: string;
  /** Selected specialists; valuation is appended and always runs */
  readonly selected: readonly SpecialistKind[];
  readonly createdAt = new Date();
  readonly gate: JoinGate;
  readonly timer: StageTimer;
  readonly fetchCache = new SharedFetchCache();

  private _status: RunStatus = 'pending';
  private _plan: InvestmentPlan | null = null;
  private _decision: FinalDecision | null = null;
  private _warnings: string[] = [];
  private _completedAt?: Date;
  private _error?: string;
  private frozen = false;

  constructor(init: AnalysisRunInit) {
    this.runId = init.runId ?? randomUUID();
    this.ticker = init.ticker;
    this.asOf = init.asOf;
    const kinds: SpecialistKind[] = init.selected.filter(k => k !== 'valuation');
    kinds.push('valuation');
    this.selected = Object.freeze(kinds);
    this.gate = new JoinGate(this.selected);
    this.timer = new StageTimer(init.clock);
  }

  get status(): RunStatus {
    return this._status;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get investmentPlan(): InvestmentPlan | null {
    return this._plan;
  }

  get finalDecision(): FinalDecision | null {
    return this._decision;
  }

  get warnings(): readonly string[] {
    return this._warnings;
  }

  get stages(): StageMapping {
    return this.gate.current();
  }

  private assertMutable(operation: string): void {
    if (this.frozen) throw new FrozenRunError(this.runId, operation);
  }

  transition(next: RunStatus): void {
    this.assertMutable(`move to ${next}`);
    if (!TRANSITIONS[this._status].includes(next)) {
      throw new PipelineError(`Illegal run transition ${this._status} -> ${next}`, 'run');
    }
    this._status = next;
  }

  /** Each specialist owns exactly one stage key */
  publish(kind: SpecialistKind, output: SpecialistOutput): void {
    this.assertMutable(`publish ${kind}`);
    if (output.kind !== kind) {
      throw new PipelineError(`Output of ${output.kind} published under ${kind}`, 'run');
    }
    this.gate.publish(STAGE_KEYS[kind], output);
  }

  addWarning(message: string): void {
    this.assertMutable('add warning');
    this._warnings.push(message);
  }

  setInvestmentPlan(plan: InvestmentPlan): void {
    this.assertMutable('set investment plan');
    if (this._plan) throw new PipelineError('Investment plan already recorded', 'portfolio_manager');
    this._plan = Object.freeze(plan);
  }

  /** Record the final decision, complete the run and freeze it */
  recordDecision(decision: FinalDecision): void {
    this.assertMutable('record decision');
    this.transition('completed');
    this._decision = decision;
    this._completedAt = new Date();
    this.frozen = true;
  }

  fail(error: string): void {
    if (this.frozen) return;
    this._status = 'failed';
    this._error = error;
    this._completedAt = new Date();
    this.frozen = true;
  }

  snapshot(): RunSnapshot {
    return {
      runId: this.runId,
      ticker: this.ticker,
      asOf: this.asOf,
      status: this._status,
      selected: this.selected,
      stages: this.stages,
      timings: this.timer.snapshot(),
      investmentPlan: this._plan,
      finalDecision: this._decision,
      warnings: [...this._warnings],
      createdAt: this.createdAt,
      completedAt: this._completedAt,
      error: this._error,
    };
  }
}
