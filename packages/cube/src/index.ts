/**
 * @closegate/cube: External collaborator ports and in-process stand-ins.
 */

export type {
  CellValue,
  DataCellRepository,
  ConfigStore,
  EntityDirectory,
} from "./types.js";

export { ConfigKeys, FlagValues } from "./config-keys.js";

export { CellReader } from "./cell-reader.js";
export type { CellRead } from "./cell-reader.js";

export {
  InMemoryDataCellRepository,
  InMemoryConfigStore,
  InMemoryEntityDirectory,
} from "./in-memory.js";

export { CubeSnapshotSchema, seedFromSnapshot, loadCubeSnapshot } from "./snapshot.js";
export type { CubeSnapshot, LoadedSnapshot } from "./snapshot.js";
