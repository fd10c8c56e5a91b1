/**
 * Point-of-view coordinates.
 *
 * A POV identifies one data cell in the financial cube. It is created once
 * per evaluation, frozen, and passed by value through every component.
 */

/** Dimension name used to tag a cell with its intercompany counterpart. */
export const IC_PARTNER_DIMENSION = "ic";

export interface Pov {
  readonly scenario: string;
  readonly period: string;
  readonly entity: string;
  readonly account?: string | undefined;
  readonly extraDimensions?: Readonly<Record<string, string>> | undefined;
}

/**
 * Build a frozen POV. Extra dimensions are copied so later mutation of the
 * caller's object cannot reach the coordinate.
 */
export function createPov(input: Pov): Pov {
  const extra =
    input.extraDimensions !== undefined
      ? Object.freeze({ ...input.extraDimensions })
      : undefined;

  return Object.freeze({
    scenario: input.scenario,
    period: input.period,
    entity: input.entity,
    ...(input.account !== undefined ? { account: input.account } : {}),
    ...(extra !== undefined ? { extraDimensions: extra } : {}),
  });
}

/** Same coordinate, different account. */
export function withAccount(pov: Pov, account: string): Pov {
  return createPov({ ...pov, account });
}

/** Same coordinate, different scenario (e.g. the Budget reference). */
export function withScenario(pov: Pov, scenario: string): Pov {
  return createPov({ ...pov, scenario });
}

/** Same coordinate for another entity, keeping scenario and period. */
export function withEntity(pov: Pov, entity: string): Pov {
  return createPov({ ...pov, entity });
}

/** Tag the coordinate with its intercompany counterpart entity. */
export function withPartner(pov: Pov, partner: string): Pov {
  return createPov({
    ...pov,
    extraDimensions: { ...pov.extraDimensions, [IC_PARTNER_DIMENSION]: partner },
  });
}

/**
 * Stable string key for a coordinate, e.g.
 * `S#Actual:T#2024M1:E#Plant01:A#Revenue:IC#Plant02`.
 *
 * Extra dimensions are emitted in sorted order so two equal POVs always
 * produce the same key.
 */
export function povKey(pov: Pov): string {
  const parts = [`S#${pov.scenario}`, `T#${pov.period}`, `E#${pov.entity}`];
  if (pov.account !== undefined) {
    parts.push(`A#${pov.account}`);
  }
  const extra = pov.extraDimensions ?? {};
  for (const name of Object.keys(extra).sort()) {
    parts.push(`${name.toUpperCase()}#${extra[name] ?? ""}`);
  }
  return parts.join(":");
}

/** Human-readable `scenario/period/entity` label. */
export function describePov(pov: Pov): string {
  return `${pov.scenario}/${pov.period}/${pov.entity}`;
}
