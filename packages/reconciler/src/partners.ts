/**
 * Partner resolution.
 *
 * The configured list (`icPartners_{entity}`, semicolon-delimited) wins.
 * When it is absent or empty, every other base entity in the hierarchy is a
 * candidate partner. The entity itself is never its own partner.
 */

import { ConfigKeys } from "@closegate/cube";
import type { ConfigStore, EntityDirectory } from "@closegate/cube";
import { DataFetchError, err, ok } from "@closegate/types";
import type { Result } from "@closegate/types";
import type { ResolvedPartners } from "./types.js";

/** Split a semicolon list, trimming blanks and dropping the entity itself. */
export function parsePartnerList(raw: string, entity: string): readonly string[] {
  const partners: string[] = [];
  for (const part of raw.split(";")) {
    const name = part.trim();
    if (name.length > 0 && name !== entity && !partners.includes(name)) {
      partners.push(name);
    }
  }
  return partners;
}

export class PartnerResolver {
  constructor(
    private readonly config: ConfigStore,
    private readonly directory: EntityDirectory,
  ) {}

  async resolve(entity: string): Promise<Result<ResolvedPartners, DataFetchError>> {
    let configError: DataFetchError | undefined;

    try {
      const raw = await this.config.get(ConfigKeys.icPartners(entity));
      if (raw !== undefined) {
        const partners = parsePartnerList(raw, entity);
        if (partners.length > 0) {
          return ok({ partners, source: "configured" });
        }
      }
    } catch (cause: unknown) {
      configError = new DataFetchError("STORE_UNAVAILABLE", describe(cause));
    }

    try {
      const entities = await this.directory.listBaseEntities();
      return ok({
        partners: [...new Set(entities)].filter((name) => name !== entity),
        source: "directory",
        configError,
      });
    } catch (cause: unknown) {
      return err(DataFetchError.from(cause));
    }
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
