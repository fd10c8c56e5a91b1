/**
 * CellReader
 *
 * Turns the repository's reject/no-data protocol into typed results:
 * - a value resolves `ok(value)`
 * - an empty cell resolves `ok(0)`
 * - a rejected read (or a non-finite number) resolves `err(DataFetchError)`
 *
 * Never throws.
 */

import { DataFetchError, ok, err } from "@closegate/types";
import type { Pov, Result } from "@closegate/types";
import type { DataCellRepository } from "./types.js";

export type CellRead = Result<number, DataFetchError>;

export class CellReader {
  constructor(private readonly repository: DataCellRepository) {}

  async read(pov: Pov): Promise<CellRead> {
    try {
      const cell = await this.repository.get(pov);
      if (cell.kind === "no-data") {
        return ok(0);
      }
      if (!Number.isFinite(cell.value)) {
        return err(
          new DataFetchError("READ_FAILED", `Non-numeric cell value ${String(cell.value)}`, pov),
        );
      }
      return ok(cell.value);
    } catch (cause: unknown) {
      return err(DataFetchError.from(cause, pov));
    }
  }

  /**
   * Read several coordinates concurrently.
   *
   * Values come back in input order. The first failing coordinate (in input
   * order) is reported when any read fails.
   */
  async readAll(povs: readonly Pov[]): Promise<Result<readonly number[], DataFetchError>> {
    const reads = await Promise.all(povs.map((pov) => this.read(pov)));
    const values: number[] = [];
    for (const read of reads) {
      if (!read.ok) {
        return read;
      }
      values.push(read.value);
    }
    return ok(values);
  }
}
