// Join gate - releases the PM stage once every required specialist has published
// Fires exactly once per run; later publishes update the mapping but never re-fire

import { STAGE_KEYS, type SpecialistKind, type SpecialistOutput, type StageKey } from '../types/agents.js';
import type { StageMapping } from '../types/analysis.js';

export type GateState = 'waiting' | 'ready';

/** Empty means null, blank text, or an empty collection */
export function isEmptyOutput(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

export class JoinGate {
  private state: GateState = 'waiting';
  private stages: StageMapping = {};
  private listeners: Array<(snapshot: StageMapping) => void> = [];
  private released: StageMapping | null = null;
  private fired = 0;
  private readonly required: readonly StageKey[];
  private readonly readyPromise: Promise<StageMapping>;
  private resolveReady: (snapshot: StageMapping) => void = () => {};

  /** Valuation is tracked but never required */
  constructor(selected: readonly SpecialistKind[]) {
    this.required = selected.filter(k => k !== 'valuation').map(k => STAGE_KEYS[k]);
    this.readyPromise = new Promise(resolve => {
      this.resolveReady = resolve;
    });
  }

  get status(): GateState {
    return this.state;
  }

  get releaseCount(): number {
    return this.fired;
  }

  get requiredStages(): readonly StageKey[] {
    return this.required;
  }

  /** Stages still blocking the gate */
  pending(): StageKey[] {
    return this.required.filter(key => isEmptyOutput(this.stages[key]?.raw));
  }

  publish(stage: StageKey, output: SpecialistOutput): void {
    this.stages = { ...this.stages, [stage]: output };
    if (this.state === 'ready') return;
    if (this.pending().length > 0) return;

    this.state = 'ready';
    this.fired++;
    const snapshot: StageMapping = Object.freeze({ ...this.stages });
    this.released = snapshot;
    this.resolveReady(snapshot);
    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) listener(snapshot);
  }

  /** Resolves once, with the mapping as it stood when the gate opened */
  whenReady(): Promise<StageMapping> {
    return this.readyPromise;
  }

  onReady(listener: (snapshot: StageMapping) => void): void {
    if (this.released) {
      listener(this.released);
      return;
    }
    this.listeners.push(listener);
  }

  /** Current tracked mapping, including stages published after release */
  current(): StageMapping {
    return { ...this.stages };
  }
}
