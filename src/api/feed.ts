import type { EngineEvent } from '../core/types.js';

/** Recent engine events, oldest first; the oldest entry is dropped once full. */
export class EventRing {
  private buffer: EngineEvent[] = [];
  private readonly maxSize: number;

  constructor(maxSize: number) {
    this.maxSize = maxSize;
  }

  push(evt: EngineEvent): void {
    if (this.buffer.length >= this.maxSize) {
      this.buffer.shift();
    }
    this.buffer.push(evt);
  }

  toArray(limit?: number): EngineEvent[] {
    if (limit === undefined || limit >= this.buffer.length) return [...this.buffer];
    return this.buffer.slice(this.buffer.length - limit);
  }
}
