/**
 * Key-Value Store
 * The persistence seam shared by every cache backend
 */

// ============================================
// Types
// ============================================

export interface KeyValueStore {
  /** Resolve the stored value, or undefined when the key was never written */
  get(key: string): Promise<string | undefined>;
  /** Replace the value for a key. Readers see either the old or the new value, never a mix */
  set(key: string, value: string): Promise<void>;
  /** Release handles held by the backend */
  close?(): void;
}

export type StoreKind = 'file' | 'sqlite' | 'memory';

// ============================================
// In-Memory Store
// ============================================

export class MemoryKeyValueStore implements KeyValueStore {
  private entries = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
