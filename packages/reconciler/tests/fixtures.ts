/**
 * Shared fixtures for reconciler tests.
 */
import { createPov, withAccount, withEntity, withPartner } from "@closegate/types";
import type { Pov } from "@closegate/types";
import { InMemoryDataCellRepository } from "@closegate/cube";

export const POV: Pov = createPov({ scenario: "Actual", period: "2024M1", entity: "Plant01" });

/** Store `value` for `entity`'s `account`, tagged with `partner`. */
export function setIc(
  cube: InMemoryDataCellRepository,
  entity: string,
  account: string,
  partner: string,
  value: number,
): InMemoryDataCellRepository {
  return cube.set(icPov(entity, account, partner), value);
}

export function icPov(entity: string, account: string, partner: string): Pov {
  return withPartner(withAccount(withEntity(POV, entity), account), partner);
}
