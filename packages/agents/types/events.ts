// Domain events emitted while a query moves through the pipeline
// Used for diagnostics and verbose tracing; never for control flow

export type DomainEventType =
  | 'QueryReceived'
  | 'QueryRejected'
  | 'QueryClassified'
  | 'QueryDecomposed'
  | 'RetrievalCompleted'
  | 'RetrievalFailed'
  | 'AnswerSynthesized'
  | 'AnswerFailed';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'QueryReceived', 'QueryRejected', 'QueryClassified', 'QueryDecomposed',
  'RetrievalCompleted', 'RetrievalFailed', 'AnswerSynthesized', 'AnswerFailed',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  requestId: string;
  payload: T;
}

export type EventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: EventHandler): void;
  off(type: DomainEventType, handler: EventHandler): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<EventHandler>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: EventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: EventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}
