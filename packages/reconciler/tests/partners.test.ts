import { describe, it, expect } from "vitest";
import { InMemoryConfigStore, InMemoryEntityDirectory } from "@closegate/cube";
import type { EntityDirectory } from "@closegate/cube";
import { PartnerResolver, parsePartnerList } from "../src/partners.js";

describe("parsePartnerList", () => {
  it("trims, drops blanks, duplicates and the entity itself", () => {
    expect(parsePartnerList(" Plant02; Plant01 ;;Plant03;Plant02", "Plant01")).toEqual([
      "Plant02",
      "Plant03",
    ]);
  });
});

describe("PartnerResolver", () => {
  const directory = new InMemoryEntityDirectory(["Plant01", "Plant02", "Plant03"]);

  it("prefers the configured list", async () => {
    const config = new InMemoryConfigStore({ icPartners_Plant01: "Plant03" });
    const resolved = await new PartnerResolver(config, directory).resolve("Plant01");

    expect(resolved).toEqual({ ok: true, value: { partners: ["Plant03"], source: "configured" } });
  });

  it("falls back to every other base entity when unconfigured", async () => {
    const resolved = await new PartnerResolver(new InMemoryConfigStore(), directory).resolve("Plant01");

    expect(resolved.ok && resolved.value.partners).toEqual(["Plant02", "Plant03"]);
    expect(resolved.ok && resolved.value.source).toBe("directory");
  });

  it("falls back when the configured list names only the entity itself", async () => {
    const config = new InMemoryConfigStore({ icPartners_Plant01: "Plant01;" });
    const resolved = await new PartnerResolver(config, directory).resolve("Plant01");

    expect(resolved.ok && resolved.value.source).toBe("directory");
  });

  it("falls back and records the error when the store cannot be read", async () => {
    const config = new InMemoryConfigStore().failOn("icPartners_Plant01");
    const resolved = await new PartnerResolver(config, directory).resolve("Plant01");

    expect(resolved.ok).toBe(true);
    if (resolved.ok) {
      expect(resolved.value.partners).toEqual(["Plant02", "Plant03"]);
      expect(resolved.value.configError?.code).toBe("STORE_UNAVAILABLE");
      expect(resolved.value.configError?.message).toBe("store unavailable for icPartners_Plant01");
    }
  });

  it("fails when neither source can be read", async () => {
    const broken: EntityDirectory = {
      listBaseEntities: () => Promise.reject(new Error("hierarchy unavailable")),
    };
    const resolved = await new PartnerResolver(new InMemoryConfigStore(), broken).resolve("Plant01");

    expect(resolved.ok).toBe(false);
    if (!resolved.ok) {
      expect(resolved.error.message).toBe("hierarchy unavailable");
    }
  });
});
