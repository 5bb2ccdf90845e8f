import type { DatasetSnapshot } from './entityDictionary';
import { SnapshotUnavailableError } from './errors';

/**
 * Holds the single current snapshot. Readers capture the reference once per
 * request; a refresh replaces it with one assignment, so in-flight requests
 * keep reading the generation they started with.
 */
export class SnapshotStore {
  private static instance: SnapshotStore;
  private snapshot: DatasetSnapshot | null = null;
  private generation = 0;

  static getInstance(): SnapshotStore {
    if (!SnapshotStore.instance) {
      SnapshotStore.instance = new SnapshotStore();
    }
    return SnapshotStore.instance;
  }

  static create(): SnapshotStore {
    return new SnapshotStore();
  }

  nextGenerationId(): number {
    this.generation += 1;
    return this.generation;
  }

  current(): DatasetSnapshot {
    if (!this.snapshot) {
      throw new SnapshotUnavailableError();
    }
    return this.snapshot;
  }

  peek(): DatasetSnapshot | null {
    return this.snapshot;
  }

  swap(next: DatasetSnapshot): DatasetSnapshot | null {
    const previous = this.snapshot;
    if (previous && next.generationId <= previous.generationId) {
      throw new Error(`Refusing to swap to generation ${next.generationId}; current is ${previous.generationId}`);
    }
    this.snapshot = next;
    this.generation = Math.max(this.generation, next.generationId);
    return previous;
  }
}
