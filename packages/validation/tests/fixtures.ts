/**
 * Shared fixtures for validation tests.
 */
import { createPov, withAccount } from "@closegate/types";
import type { Pov } from "@closegate/types";
import { CellReader, InMemoryDataCellRepository } from "@closegate/cube";

export const POV: Pov = createPov({ scenario: "Actual", period: "2024M1", entity: "Plant01" });

/** A period that passes every rule. */
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

export function cubeWith(
  values: Readonly<Record<string, number>>,
  pov: Pov = POV,
): InMemoryDataCellRepository {
  const cube = new InMemoryDataCellRepository();
  for (const [account, value] of Object.entries(values)) {
    cube.set(withAccount(pov, account), value);
  }
  return cube;
}

export function readerWith(
  values: Readonly<Record<string, number>>,
  pov: Pov = POV,
): CellReader {
  return new CellReader(cubeWith(values, pov));
}
