/**
 * Email body and chat card rendering.
 */

// =============================================================================
// Escaping
// =============================================================================

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Escape, then keep line breaks visible. */
export function textToHtml(text: string): string {
  return escapeHtml(text).replace(/\r\n|\r|\n/g, "<br/>");
}

// =============================================================================
// Email body
// =============================================================================

export interface HtmlBodyInput {
  readonly appName: string;
  readonly title: string;
  readonly summary: string;
  readonly scenario: string;
  readonly period: string;
  readonly entity: string;
  readonly timestamp: Date;
  /** Already-escaped HTML. */
  readonly detailsHtml?: string | undefined;
  readonly accentColor: string;
}

const CELL = "padding: 8px; border: 1px solid #ddd;";
const LABEL = `${CELL} font-weight: bold;`;

function contextRow(label: string, value: string, labelStyle = LABEL): string {
  return `<tr><td style="${labelStyle}">${label}</td><td style="${CELL}">${escapeHtml(value)}</td></tr>`;
}

/** `2024-02-05 09:30:00` */
export function formatUtcSeconds(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

export function renderHtmlBody(input: HtmlBodyInput): string {
  const parts = [
    '<!DOCTYPE html><html><head><meta charset="UTF-8"></head><body>',
    '<div style="font-family: Segoe UI, Arial, sans-serif; max-width: 600px; margin: 0 auto;">',
    `<div style="background-color: ${input.accentColor}; padding: 16px; color: white;">`,
    `<h2 style="margin: 0;">${escapeHtml(input.title)}</h2>`,
    "</div>",
    '<div style="padding: 20px; border: 1px solid #ddd; border-top: none;">',
    `<p style="font-size: 14px;">${escapeHtml(input.summary)}</p>`,
    '<table style="width: 100%; border-collapse: collapse; margin: 16px 0;">',
    contextRow("Scenario", input.scenario, `${LABEL} width: 30%;`),
    contextRow("Period", input.period),
    contextRow("Entity", input.entity),
    contextRow("Date/Time (UTC)", formatUtcSeconds(input.timestamp)),
    "</table>",
  ];

  if (input.detailsHtml !== undefined && input.detailsHtml.length > 0) {
    parts.push(
      `<div style="padding: 12px; background-color: #f8f9fa; border-radius: 4px; margin-top: 12px;">${input.detailsHtml}</div>`,
    );
  }

  parts.push(
    '<hr style="margin-top: 24px; border: none; border-top: 1px solid #ddd;"/>',
    `<p style="font-size: 11px; color: #6c757d;">This is an automated notification from ${escapeHtml(input.appName)}. Please do not reply to this email.</p>`,
    "</div></div></body></html>",
  );

  return parts.join("\n");
}

// =============================================================================
// Chat card
// =============================================================================

export interface MessageCard {
  readonly "@type": "MessageCard";
  readonly "@context": "http://schema.org/extensions";
  readonly summary: string;
  readonly themeColor: string;
  readonly title: string;
  readonly sections: readonly {
    readonly activityTitle: string;
    readonly activitySubtitle: string;
  }[];
}

export const CARD_THEME_COLOR = "0076D7";

export function renderMessageCard(subject: string, entity: string, at: Date): MessageCard {
  return {
    "@type": "MessageCard",
    "@context": "http://schema.org/extensions",
    summary: subject,
    themeColor: CARD_THEME_COLOR,
    title: subject,
    sections: [
      {
        activityTitle: `Entity: ${entity}`,
        activitySubtitle: `${formatUtcSeconds(at).slice(0, 16)} UTC`,
      },
    ],
  };
}
