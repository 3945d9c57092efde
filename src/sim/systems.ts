/**
 * Named auxiliary systems (quests, farms, timers...) updated once per turn.
 * The registry is owned by the World and handed to every system through
 * the turn context, never reached through globals.
 */
import type { Entity } from "../shared/types.js";

export interface TurnContext {
  turn: number;
  player: Entity | null;
  systems: SystemRegistry;
  log: (message: string) => void;
}

export interface WorldSystem {
  update?(context: TurnContext): void;
}

export class SystemRegistry {
  private readonly systems = new Map<string, WorldSystem>();

  register(name: string, system: WorldSystem): void {
    this.systems.set(name, system);
  }

  unregister(name: string): boolean {
    return this.systems.delete(name);
  }

  get(name: string): WorldSystem | null {
    return this.systems.get(name) ?? null;
  }

  /** Typed lookup: null unless the system is an instance of `type`. */
  getAs<T extends WorldSystem>(name: string, type: new (...args: never[]) => T): T | null {
    const system = this.systems.get(name);
    return system instanceof type ? system : null;
  }

  names(): string[] {
    return [...this.systems.keys()];
  }

  /** Run every system's update in registration order. */
  update(context: TurnContext): void {
    for (const [, system] of this.systems) {
      system.update?.(context);
    }
  }
}
