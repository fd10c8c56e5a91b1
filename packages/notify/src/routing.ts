/**
 * Event kind → recipients and message content.
 *
 * | Kind         | Role        | Entity                 | Colour  |
 * |--------------|-------------|------------------------|---------|
 * | submission   | Approver    | event entity           | #007BFF |
 * | approval     | Submitter   | event entity           | #28A745 |
 * | rejection    | Submitter   | event entity           | #DC3545 |
 * | data-quality | DataSteward | event entity           | #FFC107 |
 * | ic-mismatch  | Controller  | event entity + partner | #DC3545 |
 */

import type { NotificationKind } from "@closegate/types";
import { textToHtml } from "./template.js";
import type { NotificationEvent, NotificationRole } from "./types.js";

export const SEVERITY_COLORS: Readonly<Record<NotificationKind, string>> = {
  submission: "#007BFF",
  approval: "#28A745",
  rejection: "#DC3545",
  "data-quality": "#FFC107",
  "ic-mismatch": "#DC3545",
};

export const ROLE_FOR_KIND: Readonly<Record<NotificationKind, NotificationRole>> = {
  submission: "Approver",
  approval: "Submitter",
  rejection: "Submitter",
  "data-quality": "DataSteward",
  "ic-mismatch": "Controller",
};

/** One message to one role of one entity. */
export interface PlannedMessage {
  readonly role: NotificationRole;
  /** Entity whose role is resolved and whose context the message shows. */
  readonly entity: string;
  readonly subject: string;
  readonly title: string;
  readonly summary: string;
  readonly detailsHtml: string;
  readonly accentColor: string;
}

const UNKNOWN_ACTOR = "Unknown user";

export function planMessages(event: NotificationEvent, appName: string): readonly PlannedMessage[] {
  const { scenario, period, entity } = event.pov;
  const fields = event.extraFields ?? {};
  const actor = event.actor ?? UNKNOWN_ACTOR;
  const pov = `${scenario} / ${period} / ${entity}`;
  const role = ROLE_FOR_KIND[event.kind];
  const accentColor = SEVERITY_COLORS[event.kind];

  switch (event.kind) {
    case "submission":
      return [
        {
          role,
          entity,
          accentColor,
          subject: `[${appName}] Data Submitted for Review - ${pov}`,
          title: "Data Submission Notification",
          summary: `${actor} has submitted data for your review.`,
          detailsHtml: "Please review and approve or reject the submission in the close workflow.",
        },
      ];

    case "approval":
      return [
        {
          role,
          entity,
          accentColor,
          subject: `[${appName}] Data Approved - ${pov}`,
          title: "Data Approval Notification",
          summary: `Your submission has been approved by ${actor}.`,
          detailsHtml: "No further action is required.",
        },
      ];

    case "rejection":
      return [
        {
          role,
          entity,
          accentColor,
          subject: `[${appName}] Data Rejected - ${pov}`,
          title: "Data Rejection Notification",
          summary: `Your submission has been rejected by ${actor}.`,
          detailsHtml:
            `<strong>Rejection Reason:</strong><br/>${textToHtml(fields["rejectionReason"] ?? "No reason provided.")}` +
            "<br/><br/>Please correct the issues and resubmit.",
        },
      ];

    case "data-quality":
      return [
        {
          role,
          entity,
          accentColor,
          subject: `[${appName}] Data Quality Alert - ${pov}`,
          title: "Data Quality Alert",
          summary: "Data quality validation has identified issues requiring attention.",
          detailsHtml: `<strong>Validation Issues:</strong><br/>${textToHtml(fields["failureDetails"] ?? "See system log for details.")}`,
        },
      ];

    case "ic-mismatch": {
      const partner = fields["partnerEntity"];
      const detailsHtml =
        `<strong>Mismatch Details:</strong><br/>${textToHtml(fields["mismatchDetails"] ?? "See IC matching report.")}` +
        "<br/><br/>Please coordinate with the partner entity controller to resolve.";
      const between = (own: string, other: string): PlannedMessage => ({
        role,
        entity: own,
        accentColor,
        detailsHtml,
        subject: `[${appName}] IC Mismatch Alert - ${own} vs ${other} / ${period}`,
        title: "Intercompany Mismatch Alert",
        summary: `IC balance mismatch detected between ${own} and ${other}.`,
      });
      return partner === undefined || partner.length === 0
        ? [between(entity, "Unknown")]
        : [between(entity, partner), between(partner, entity)];
    }
  }
}

/** Workflow actions that raise a notification. */
export function inferNotificationKind(action: string): NotificationKind | undefined {
  switch (action.trim().toLowerCase()) {
    case "submit":
      return "submission";
    case "approve":
      return "approval";
    case "reject":
      return "rejection";
    default:
      return undefined;
  }
}
