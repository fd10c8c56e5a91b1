/**
 * @closegate/cube: Ports for the external collaborators.
 *
 * The financial data cube, the key/value configuration store and the entity
 * hierarchy live outside this system. These interfaces are all the gate
 * engine knows about them.
 */

import type { Pov } from "@closegate/types";

// =============================================================================
// Data cube
// =============================================================================

/** A resolved cell: a number, or explicitly no data. */
export type CellValue =
  | { readonly kind: "value"; readonly value: number }
  | { readonly kind: "no-data" };

/**
 * Financial data-cube reader.
 *
 * Rejects when the coordinate cannot be read at all (transient or
 * permanent failure); resolves `no-data` when the cell is simply empty.
 */
export interface DataCellRepository {
  get(pov: Pov): Promise<CellValue>;
}

// =============================================================================
// Configuration store
// =============================================================================

/**
 * External key/value state: workflow flags, commentary, IC partner lists,
 * role→address maps and webhook URLs.
 */
export interface ConfigStore {
  /** Resolves `undefined` when the key is absent. */
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
}

// =============================================================================
// Entity hierarchy
// =============================================================================

export interface EntityDirectory {
  /** Every base (leaf) entity of the consolidation hierarchy. */
  listBaseEntities(): Promise<readonly string[]>;
}
