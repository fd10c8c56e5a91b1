/**
 * WorkflowFlags
 *
 * Typed snapshot of the externally-set workflow flags a submission depends
 * on. Flags are written by other actors (the data-quality run, the IC
 * reconciliation owner, the approving manager) and are read once per
 * evaluation. `readAt` records when; flags carry no version of their own.
 */

import { ConfigKeys } from "@closegate/cube";
import type { ConfigStore } from "@closegate/cube";
import type { Pov } from "@closegate/types";

export type FlagValue =
  | { readonly state: "set"; readonly value: string }
  | { readonly state: "absent" }
  | { readonly state: "unreadable"; readonly reason: string };

export interface WorkflowFlags {
  readonly dataQualityStatus: FlagValue;
  readonly icReconStatus: FlagValue;
  readonly managerApproval: FlagValue;
  /** Commentary per account code. */
  readonly commentary: ReadonlyMap<string, FlagValue>;
  /** ISO timestamp of the read. */
  readonly readAt: string;
}

/** True when the flag is set to `expected`, ignoring case and surrounding space. */
export function flagEquals(flag: FlagValue, expected: string): boolean {
  return flag.state === "set" && flag.value.trim().toLowerCase() === expected.toLowerCase();
}

/** True when the flag holds any non-blank text. */
export function flagPresent(flag: FlagValue): boolean {
  return flag.state === "set" && flag.value.trim().length > 0;
}

/**
 * Populates WorkflowFlags from the external key/value store.
 *
 * A key that cannot be read becomes an `unreadable` flag; the gate that
 * consumes it decides what that means.
 */
export class WorkflowFlagsAdapter {
  constructor(
    private readonly store: ConfigStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async load(pov: Pov, commentaryAccounts: readonly string[] = []): Promise<WorkflowFlags> {
    const readAt = this.clock().toISOString();
    const { entity, period, scenario } = pov;

    const [dataQualityStatus, icReconStatus, managerApproval, comments] = await Promise.all([
      this.read(ConfigKeys.dataQualityStatus(entity, period)),
      this.read(ConfigKeys.icReconStatus(entity, period)),
      this.read(ConfigKeys.managerApproval(entity, scenario, period)),
      Promise.all(
        commentaryAccounts.map((account) => this.read(ConfigKeys.commentary(entity, account, period))),
      ),
    ]);

    const commentary = new Map<string, FlagValue>();
    commentaryAccounts.forEach((account, i) => {
      commentary.set(account, comments[i] ?? { state: "absent" });
    });

    return { dataQualityStatus, icReconStatus, managerApproval, commentary, readAt };
  }

  private async read(key: string): Promise<FlagValue> {
    try {
      const value = await this.store.get(key);
      return value === undefined ? { state: "absent" } : { state: "set", value };
    } catch (cause: unknown) {
      return {
        state: "unreadable",
        reason: cause instanceof Error ? cause.message : String(cause),
      };
    }
  }
}
