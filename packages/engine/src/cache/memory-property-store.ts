import type { PropertyStore } from "./types";

/**
 * Process-scoped property slots. Contents are lost with the process.
 */
export class MemoryPropertyStore implements PropertyStore {
  private readonly slots = new Map<string, string>();

  get(key: string): Promise<string | null> {
    return Promise.resolve(this.slots.get(key) ?? null);
  }

  set(key: string, value: string): Promise<void> {
    this.slots.set(key, value);
    return Promise.resolve();
  }

  remove(key: string): Promise<void> {
    this.slots.delete(key);
    return Promise.resolve();
  }

  keys(): string[] {
    return Array.from(this.slots.keys());
  }
}

export const createMemoryPropertyStore = (): MemoryPropertyStore => new MemoryPropertyStore();
