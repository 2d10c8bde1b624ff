import type { Adapter } from "./adapter.js";
import { MissingRequiredFieldError } from "./errors.js";

/**
 * Lazily loaded set of related entities. The first `fetchAll` runs the
 * relation's load request; later calls return the same map until
 * `refresh` is called. Nothing here refreshes on its own. A failed
 * `refresh` leaves the previous contents in place.
 *
 * Not safe for overlapping use: await one `fetchAll`/`refresh` before
 * starting another on the same collection.
 */
export abstract class Collection<K, E> {
  protected cache?: Map<K, E>;

  constructor(protected readonly adapter: Adapter) {}

  get size(): number {
    return this.cache?.size ?? 0;
  }

  isLoaded(): boolean {
    return this.cache !== undefined;
  }

  /** Current contents without touching the network. */
  cached(): ReadonlyMap<K, E> {
    return this.cache ?? new Map<K, E>();
  }

  async fetchAll(): Promise<Map<K, E>> {
    this.assertReady();
    if (this.cache === undefined) {
      this.cache = await this.load();
    }
    return this.cache;
  }

  async refresh(): Promise<Map<K, E>> {
    this.assertReady();
    const next = await this.load();
    this.cache = next;
    return next;
  }

  protected assertReady(): void {}

  protected store(key: K, entity: E): void {
    this.cache ??= new Map<K, E>();
    this.cache.set(key, entity);
  }

  protected index(
    entities: E[],
    field: string,
    keyOf: (entity: E) => K | undefined,
  ): Map<K, E> {
    const map = new Map<K, E>();
    entities.forEach((entity) => {
      const key = keyOf(entity);
      if (key === undefined) {
        throw new MissingRequiredFieldError(field);
      }
      map.set(key, entity);
    });
    return map;
  }

  protected abstract load(): Promise<Map<K, E>>;
}
