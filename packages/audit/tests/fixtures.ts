import type { AuditContext } from "../src/types.js";

export const CONTEXT: AuditContext = {
  user: "jdoe",
  timestampUtc: new Date("2024-02-05T09:30:00.123Z"),
  sessionId: "sess-1",
  machine: "host-a",
  scenario: "Actual",
  period: "2024M1",
  entity: "Plant01",
};

export const HEADER =
  "AUDIT_TRAIL|{category}|Timestamp=2024-02-05 09:30:00.123|User=jdoe|Session=sess-1" +
  "|Machine=host-a|Scenario=Actual|Period=2024M1|Entity=Plant01";

export function header(category: string): string {
  return HEADER.replace("{category}", category);
}
