import type { Action, GameEvent } from '../models.js';
import { compileNameFilter } from './qualityRegistry.js';

export class EventCatalog {
  private readonly events = new Map<number, GameEvent>();
  private readonly order: GameEvent[] = [];

  constructor(events: Iterable<GameEvent> = []) {
    for (const event of events) {
      if (this.events.has(event.id)) continue;
      this.events.set(event.id, event);
      this.order.push(event);
    }
  }

  get size(): number {
    return this.order.length;
  }

  get(id: number): GameEvent | undefined {
    return this.events.get(id);
  }

  all(): readonly GameEvent[] {
    return this.order;
  }

  find(filter?: string): GameEvent[] {
    if (!filter) return [...this.order];
    const pattern = compileNameFilter(filter);
    return this.order.filter((event) => pattern.test(event.name));
  }

  /** Events limited to an area, by area id or case-insensitive area name. */
  at(area: number | string): GameEvent[] {
    if (typeof area === 'number') {
      return this.order.filter((event) => event.location?.id === area);
    }
    const pattern = compileNameFilter(area);
    return this.order.filter((event) => event.location !== undefined && pattern.test(event.location.name));
  }

  /** Action by 1-based position, the way the game lists them. */
  action(eventId: number, position: number): Action | undefined {
    return this.events.get(eventId)?.actions[position - 1];
  }
}
