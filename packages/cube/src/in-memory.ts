/**
 * In-process stand-ins for the external collaborators.
 *
 * Used by tests and by the node service when it runs from a snapshot file.
 * Reads can be made to fail per coordinate or per key to exercise the
 * degrade policies.
 */

import { povKey } from "@closegate/types";
import type { Pov } from "@closegate/types";
import type { CellValue, ConfigStore, DataCellRepository, EntityDirectory } from "./types.js";

// =============================================================================
// Data cube
// =============================================================================

export class InMemoryDataCellRepository implements DataCellRepository {
  private readonly _cells = new Map<string, number>();
  private readonly _failures = new Map<string, Error>();
  private _reads = 0;

  /** Store a value at a coordinate. */
  set(pov: Pov, value: number): this {
    this._cells.set(povKey(pov), value);
    return this;
  }

  /** Make every read of this coordinate reject with `error`. */
  failOn(pov: Pov, error: Error = new Error(`read failed for ${povKey(pov)}`)): this {
    this._failures.set(povKey(pov), error);
    return this;
  }

  get(pov: Pov): Promise<CellValue> {
    this._reads += 1;
    const key = povKey(pov);
    const failure = this._failures.get(key);
    if (failure !== undefined) {
      return Promise.reject(failure);
    }
    const value = this._cells.get(key);
    if (value === undefined) {
      return Promise.resolve({ kind: "no-data" });
    }
    return Promise.resolve({ kind: "value", value });
  }

  /** Number of reads served, failed ones included. */
  get readCount(): number {
    return this._reads;
  }

  get size(): number {
    return this._cells.size;
  }
}

// =============================================================================
// Configuration store
// =============================================================================

export class InMemoryConfigStore implements ConfigStore {
  private readonly _values = new Map<string, string>();
  private readonly _failures = new Map<string, Error>();

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this._values.set(key, value);
    }
  }

  /** Make reads of `key` reject with `error`. */
  failOn(key: string, error: Error = new Error(`store unavailable for ${key}`)): this {
    this._failures.set(key, error);
    return this;
  }

  get(key: string): Promise<string | undefined> {
    const failure = this._failures.get(key);
    if (failure !== undefined) {
      return Promise.reject(failure);
    }
    return Promise.resolve(this._values.get(key));
  }

  set(key: string, value: string): Promise<void> {
    this._values.set(key, value);
    return Promise.resolve();
  }

  /** Synchronous peek for assertions. */
  peek(key: string): string | undefined {
    return this._values.get(key);
  }

  entries(): ReadonlyMap<string, string> {
    return this._values;
  }
}

// =============================================================================
// Entity hierarchy
// =============================================================================

export class InMemoryEntityDirectory implements EntityDirectory {
  private readonly _entities: readonly string[];

  constructor(entities: readonly string[] = []) {
    this._entities = [...entities];
  }

  listBaseEntities(): Promise<readonly string[]> {
    return Promise.resolve(this._entities);
  }
}
