import { AsyncLocalStorage } from 'node:async_hooks';

type Undo = () => void;

/**
 * Undo log for in-memory map writes
 *
 * Writes made inside `run` (in the same async context) record how to reverse
 * themselves. Writes from any other context are never recorded, so a rollback
 * only reverses what the failed unit of work did.
 */
export class UndoJournal {
  private readonly context = new AsyncLocalStorage<Undo[]>();

  /**
   * Whether the caller runs inside a journaled unit of work
   */
  active(): boolean {
    return this.context.getStore() !== undefined;
  }

  /**
   * Run `fn` with a fresh log; on failure every recorded write is reversed
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const log: Undo[] = [];

    try {
      return await this.context.run(log, fn);
    } catch (error) {
      for (const undo of log.reverse()) {
        undo();
      }
      throw error;
    }
  }

  set<K, V>(map: Map<K, V>, key: K, value: V): void {
    this.record(map, key);
    map.set(key, value);
  }

  delete<K, V>(map: Map<K, V>, key: K): void {
    this.record(map, key);
    map.delete(key);
  }

  private record<K, V>(map: Map<K, V>, key: K): void {
    const log = this.context.getStore();
    if (!log) return;

    const had = map.has(key);
    const previous = map.get(key);
    log.push(() => {
      if (had && previous !== undefined) {
        map.set(key, previous);
      } else {
        map.delete(key);
      }
    });
  }
}
