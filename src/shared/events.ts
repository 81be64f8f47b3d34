import { EventEmitter } from 'eventemitter3';

/**
 * All typed events emitted by the discovery pipeline and its collaborators.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface AppEvents {
  'run:started': {
    runId: string;
    trigger: 'scheduled' | 'manual' | 'direct';
  };
  'run:completed': {
    runId: string;
    candidates: number;
    confirmed: number;
    durationMs: number;
  };
  'run:failed': {
    runId: string;
    error: string;
  };
  'source:started': {
    runId: string;
    source: string;
  };
  'source:completed': {
    runId: string;
    source: string;
    candidates: number;
    errors: number;
  };
  'source:failed': {
    runId: string;
    source: string;
    error: string;
  };
  'course:confirmed': {
    runId: string;
    url: string;
    title: string;
    source: string;
  };
  'delivery:completed': {
    channel: string;
    delivered: number;
    failed: number;
  };
}

/**
 * Strongly-typed event emitter. Components accept one through their
 * options so tests can observe a private bus; production code shares
 * the `eventBus` singleton.
 */
export class TypedEventEmitter extends EventEmitter<AppEvents> {}

export const eventBus = new TypedEventEmitter();
