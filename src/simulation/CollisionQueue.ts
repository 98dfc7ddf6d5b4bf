import type { CollisionEvent } from './CollisionDetection';

/** Events written by discovery and drained by the resolver, in order. */
export class CollisionQueue {
  private events: CollisionEvent[] = [];

  push(event: CollisionEvent): void {
    this.events.push(event);
  }

  get length(): number {
    return this.events.length;
  }

  peek(): readonly CollisionEvent[] {
    return this.events;
  }

  drain(): CollisionEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}
