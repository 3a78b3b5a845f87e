import EE3 from 'eventemitter3';
import type { AnalysisEvents } from '../types.js';

// Cast eventemitter3 to a constructable class
const EventEmitter = EE3 as unknown as { new (): {
  emit(event: string, ...args: unknown[]): boolean;
  on(event: string, fn: (...args: unknown[]) => void): unknown;
  off(event: string, fn: (...args: unknown[]) => void): unknown;
  removeAllListeners(event?: string): unknown;
}};

export class AnalysisEmitter extends EventEmitter {
  emit<K extends keyof AnalysisEvents>(event: K, ...args: Parameters<AnalysisEvents[K]>): boolean {
    return super.emit(event, ...args);
  }

  on<K extends keyof AnalysisEvents>(event: K, fn: AnalysisEvents[K]): this {
    super.on(event, fn as (...args: unknown[]) => void);
    return this;
  }

  off<K extends keyof AnalysisEvents>(event: K, fn: AnalysisEvents[K]): this {
    super.off(event, fn as (...args: unknown[]) => void);
    return this;
  }

  removeAllListeners<K extends keyof AnalysisEvents>(event?: K): this {
    super.removeAllListeners(event);
    return this;
  }
}
