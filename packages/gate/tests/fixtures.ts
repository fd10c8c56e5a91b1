/**
 * Shared fixtures for gate tests.
 */
import { createPov, withAccount, withScenario } from "@closegate/types";
import type { Pov } from "@closegate/types";
import {
  CellReader,
  InMemoryConfigStore,
  InMemoryDataCellRepository,
  InMemoryEntityDirectory,
} from "@closegate/cube";
import type { DataCellRepository } from "@closegate/cube";
import { IcReconciler } from "@closegate/reconciler";
import { SubmissionGateController } from "../src/controller.js";
import type { FlagValue, WorkflowFlags } from "../src/flags.js";

export const ACTUAL: Pov = createPov({ scenario: "Actual", period: "2024M1", entity: "Plant01" });
export const FORECAST: Pov = withScenario(ACTUAL, "Forecast");
export const FIXED_NOW = new Date("2024-02-05T09:30:00.000Z");

/** A period that passes every validation rule. */
export const HEALTHY: Readonly<Record<string, number>> = {
  TotalDebits: 500_000,
  TotalCredits: 500_000,
  TotalAssets: 2_000_000,
  TotalLiabilities: 1_200_000,
  TotalEquity: 800_000,
  Revenue: 1_250_000,
  COGS: 750_000,
  GrossProfit: 500_000,
  OperatingExpenses: 300_000,
  RawMaterials: 40_000,
  WorkInProcess: 25_000,
  FinishedGoods: 60_000,
  TotalInventory: 125_000,
  CashAndEquivalents: 90_000,
  STAT_Headcount: 120,
  STAT_FTE: 115.5,
  STAT_ProductionVolume: 48_000,
};

/** Budget equal to actuals, so no variance is material. */
export const ON_BUDGET: Readonly<Record<string, number>> = {
  Revenue: 1_250_000,
  COGS: 750_000,
  GrossProfit: 500_000,
  OperatingExpenses: 300_000,
};

export function seed(
  cube: InMemoryDataCellRepository,
  pov: Pov,
  values: Readonly<Record<string, number>>,
): InMemoryDataCellRepository {
  for (const [account, value] of Object.entries(values)) {
    cube.set(withAccount(pov, account), value);
  }
  return cube;
}

export function flagsOf(overrides: Partial<WorkflowFlags> = {}): WorkflowFlags {
  const absent: FlagValue = { state: "absent" };
  return {
    dataQualityStatus: absent,
    icReconStatus: absent,
    managerApproval: absent,
    commentary: new Map(),
    readAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

export function set(value: string): FlagValue {
  return { state: "set", value };
}

export interface World {
  readonly cube: InMemoryDataCellRepository;
  readonly config: InMemoryConfigStore;
  readonly entities: InMemoryEntityDirectory;
  readonly controller: SubmissionGateController;
}

/**
 * A ready-to-submit Actual period for Plant01: healthy data, on budget,
 * data quality passed, no IC partners.
 */
export function readyWorld(repository?: DataCellRepository): World {
  const cube = new InMemoryDataCellRepository();
  seed(cube, ACTUAL, HEALTHY);
  seed(cube, withScenario(ACTUAL, "Budget"), ON_BUDGET);

  const config = new InMemoryConfigStore({ dataQualityStatus_Plant01_2024M1: "passed" });
  const entities = new InMemoryEntityDirectory(["Plant01"]);
  const reader = new CellReader(repository ?? cube);

  const controller = new SubmissionGateController({
    reader,
    config,
    reconciler: new IcReconciler({ reader, config, entities }),
    clock: () => FIXED_NOW,
  });
  return { cube, config, entities, controller };
}
