import { EventEmitter } from 'events';
import { injectable } from 'inversify';
import { IterationRecord } from '../../../domain/entities/IterationRecord';
import { IterationState } from '../IterationState';
import { logger } from '../../logging/Logger';

export interface StateChangedEvent {
  iterationIndex: number | null;
  from: IterationState;
  to: IterationState;
  timestamp: Date;
}

export interface CouncilEventMap {
  state: StateChangedEvent;
  iteration: IterationRecord;
}

/**
 * Broadcasts state changes and finished or waiting iteration records.
 * A listener that throws is logged and never interrupts the iteration that emitted.
 */
@injectable()
export class CouncilEventEmitter extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(50);
  }

  publish<K extends keyof CouncilEventMap>(event: K, payload: CouncilEventMap[K]): void {
    for (const listener of this.listeners(event)) {
      try {
        listener.call(this, payload);
      } catch (error) {
        logger.error('Error calling council event listener', {
          event,
          error: error instanceof Error ? error.message : 'Unknown error'
        });
      }
    }
  }

  subscribe<K extends keyof CouncilEventMap>(event: K, listener: (payload: CouncilEventMap[K]) => void): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }
}
