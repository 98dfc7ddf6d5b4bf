import type { Vec2 } from '../utils/MathUtils';

type EventCallback<T = unknown> = (data: T) => void;

interface EventMap {
  'sim:started': {};
  'sim:paused': { paused: boolean };
  'sim:tick': { tick: number; events: number };
  'collision:world': { eid: number; normal: Vec2; velocity: Vec2 };
  'collision:pair': { a: number; b: number; velocityA: Vec2; velocityB: Vec2 };
  'collision:blocked': { eid: number; by: number };
  'collision:skipped': { eids: number[]; reason: 'stale' };
  'cascade:limit': { steps: number; dropped: number };
}

type EventName = keyof EventMap;

type ListenerMap = { [K in EventName]?: Set<EventCallback<EventMap[K]>> };

class EventBusImpl {
  private listeners: ListenerMap = {};

  on<K extends EventName>(event: K, callback: EventCallback<EventMap[K]>): void {
    let set: Set<EventCallback<EventMap[K]>> | undefined = this.listeners[event];
    if (!set) {
      set = new Set();
      this.listeners[event] = set;
    }
    set.add(callback);
  }

  off<K extends EventName>(event: K, callback: EventCallback<EventMap[K]>): void {
    const set: Set<EventCallback<EventMap[K]>> | undefined = this.listeners[event];
    set?.delete(callback);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    const set: Set<EventCallback<EventMap[K]>> | undefined = this.listeners[event];
    set?.forEach(cb => cb(data));
  }

  clear(): void {
    this.listeners = {};
  }
}

export const EventBus = new EventBusImpl();
export type { EventMap, EventName };
