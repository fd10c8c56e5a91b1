/**
 * Key catalog for the external configuration store.
 *
 * Every string key the engine reads or writes is built here so that the
 * gate logic never assembles store keys itself.
 */

export const ConfigKeys = {
  /** Set to `passed` / `failed` by the data-quality run. */
  dataQualityStatus: (entity: string, period: string): string =>
    `dataQualityStatus_${entity}_${period}`,

  /** Set to `reconciled` by whoever confirms the IC reconciliation. */
  icReconStatus: (entity: string, period: string): string =>
    `icReconStatus_${entity}_${period}`,

  /** Set to `approved` by the approving manager. */
  managerApproval: (entity: string, scenario: string, period: string): string =>
    `managerApproval_${entity}_${scenario}_${period}`,

  /** Free-text variance commentary. */
  commentary: (entity: string, account: string, period: string): string =>
    `commentary_${entity}_${account}_${period}`,

  /** Semicolon-delimited list of IC partner entities. */
  icPartners: (entity: string): string => `icPartners_${entity}`,

  /** Set to `REQUIRED` by the budget variance scan. */
  managementReview: (entity: string, period: string, scenario: string): string =>
    `mgmtReview_${entity}_${period}_${scenario}`,

  roleAddress: (roleKey: string, entity: string): string =>
    `${roleKey}Email_${entity}`,

  defaultRoleAddress: (roleKey: string): string => `default${roleKey}Email`,

  chatWebhook: (entity: string): string => `chatWebhook_${entity}`,

  defaultChatWebhook: (): string => "defaultChatWebhook",
} as const;

/** Well-known flag values. Comparison is case-insensitive. */
export const FlagValues = {
  passed: "passed",
  failed: "failed",
  reconciled: "reconciled",
  approved: "approved",
  reviewRequired: "REQUIRED",
} as const;
