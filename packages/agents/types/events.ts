// Domain events emitted while a run progresses
// Used by the job surface and CLI to observe specialists, the join gate and the decision stages

export type DomainEventType =
  // Orchestration
  | 'AnalysisRequested'
  | 'GateReleased'
  | 'AggregationCompleted'
  | 'RiskAdjusted'
  | 'AnalysisCompleted'
  | 'AnalysisFailed'
  // Specialists
  | 'SpecialistStarted'
  | 'SpecialistCompleted'
  | 'ToolCalled'
  | 'ToolSucceeded'
  | 'ToolFailed';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'AnalysisRequested', 'GateReleased', 'AggregationCompleted', 'RiskAdjusted',
  'AnalysisCompleted', 'AnalysisFailed', 'SpecialistStarted', 'SpecialistCompleted',
  'ToolCalled', 'ToolSucceeded', 'ToolFailed',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  runId: string;
  payload: T;
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}
