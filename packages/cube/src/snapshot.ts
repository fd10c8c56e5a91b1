/**
 * Snapshot loader.
 *
 * Seeds the in-process stand-ins from a JSON file so the node service can run
 * without a live cube. File format:
 *
 * {
 *   "entities": ["Plant01", "Plant02"],
 *   "cells": [{ "scenario": "Actual", "period": "2024M1", "entity": "Plant01",
 *               "account": "Revenue", "value": 1250000 }],
 *   "config": { "icPartners_Plant01": "Plant02" }
 * }
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { createPov } from "@closegate/types";
import {
  InMemoryConfigStore,
  InMemoryDataCellRepository,
  InMemoryEntityDirectory,
} from "./in-memory.js";

export const CubeSnapshotSchema = z.object({
  entities: z.array(z.string().min(1)).default([]),
  cells: z
    .array(
      z.object({
        scenario: z.string().min(1),
        period: z.string().min(1),
        entity: z.string().min(1),
        account: z.string().min(1).optional(),
        extraDimensions: z.record(z.string()).optional(),
        value: z.number().finite(),
      }),
    )
    .default([]),
  config: z.record(z.string()).default({}),
});

export type CubeSnapshot = z.infer<typeof CubeSnapshotSchema>;

export interface LoadedSnapshot {
  readonly cube: InMemoryDataCellRepository;
  readonly config: InMemoryConfigStore;
  readonly entities: InMemoryEntityDirectory;
}

/** Build the stand-ins from an already-parsed snapshot object. */
export function seedFromSnapshot(raw: unknown): LoadedSnapshot {
  const snapshot = CubeSnapshotSchema.parse(raw);
  const cube = new InMemoryDataCellRepository();

  for (const cell of snapshot.cells) {
    cube.set(
      createPov({
        scenario: cell.scenario,
        period: cell.period,
        entity: cell.entity,
        account: cell.account,
        extraDimensions: cell.extraDimensions,
      }),
      cell.value,
    );
  }

  return {
    cube,
    config: new InMemoryConfigStore(snapshot.config),
    entities: new InMemoryEntityDirectory(snapshot.entities),
  };
}

/**
 * Read and validate a snapshot file.
 *
 * @throws {z.ZodError} when the file does not match the schema
 * @throws {SyntaxError} when the file is not JSON
 */
export function loadCubeSnapshot(filePath: string): LoadedSnapshot {
  const text = readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(text);
  return seedFromSnapshot(parsed);
}
