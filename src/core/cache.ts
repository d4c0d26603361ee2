import { Mutex } from "async-mutex";

interface Versioned {
  metadata?: { resourceVersion?: string };
}

interface Entry<T> {
  resourceVersion: string;
  object: T;
}

/**
 * Holds the last observed instance of one singleton object. An update is
 * applied only when its resourceVersion differs from the cached one; the
 * comparison is by identity, not by order. Reads and writes share a lock so a
 * reader outside the running batch always sees a complete entry.
 */
export class VersionedCache<T extends Versioned> {
  private readonly mutex = new Mutex();
  private entry: Entry<T> | null = null;

  /** Returns true when the cached object was replaced. */
  update(object: T): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const resourceVersion = object.metadata?.resourceVersion ?? "";
      if (this.entry && this.entry.resourceVersion === resourceVersion) {
        return false;
      }
      this.entry = { resourceVersion, object: structuredClone(object) };
      return true;
    });
  }

  /** Returns a copy; the cached object is only replaced through update(). */
  get(): Promise<T | undefined> {
    return this.mutex.runExclusive(() => (this.entry ? structuredClone(this.entry.object) : undefined));
  }

  resourceVersion(): Promise<string | undefined> {
    return this.mutex.runExclusive(() => this.entry?.resourceVersion);
  }
}
