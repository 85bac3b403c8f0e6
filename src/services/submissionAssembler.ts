import type { IFieldSpec } from "./issueFormTypes.js";
import type { IModalSession } from "./modalSessionService.js";

export const MAX_PLACEHOLDER_LENGTH = 100;
const ELLIPSIS = "...";

const resolveLabel = (fields: readonly IFieldSpec[], identifier: string): string => {
  const match = fields.find((field) => field.identifier === identifier);
  return match ? match.displayLabel : identifier;
};

/** Merges submitted values into the session and returns how many are collected. */
export const mergeSubmission = (
  session: IModalSession,
  submittedValues: Readonly<Record<string, string>>,
): number => {
  for (const [identifier, value] of Object.entries(submittedValues)) {
    session.collectedValues.set(resolveLabel(session.orderedFields, identifier), value);
  }
  return session.collectedValues.size;
};

export const isSessionComplete = (session: IModalSession): boolean => {
  return session.collectedValues.size >= session.orderedFields.length;
};

/**
 * Builds the issue body. Values follow the form's field order; labels that no
 * field declares are appended afterwards in submission order.
 */
export const renderIssueBody = (
  collectedValues: ReadonlyMap<string, string>,
  orderedFields: readonly IFieldSpec[],
  username: string,
  userId: string,
): string => {
  const orderedLabels: string[] = [];
  for (const field of orderedFields) {
    if (collectedValues.has(field.displayLabel) && !orderedLabels.includes(field.displayLabel)) {
      orderedLabels.push(field.displayLabel);
    }
  }
  for (const label of collectedValues.keys()) {
    if (!orderedLabels.includes(label)) {
      orderedLabels.push(label);
    }
  }

  const sections = orderedLabels.map((label) => {
    return `### ${label}\n${collectedValues.get(label) ?? ""}\n\n`;
  });

  return `${sections.join("")}\n---\nSubmitted via Discord by: ${username} (${userId})`;
};

export const truncateForDisplay = (text: string): string => {
  if (text.length <= MAX_PLACEHOLDER_LENGTH) return text;
  return text.slice(0, MAX_PLACEHOLDER_LENGTH - ELLIPSIS.length) + ELLIPSIS;
};

/** Uses the `<command>_title` field as the issue title when the form has one. */
export const resolveIssueTitle = (
  command: string,
  orderedFields: readonly IFieldSpec[],
  collectedValues: ReadonlyMap<string, string>,
  fallback: string,
): string => {
  const titleField = orderedFields.find((field) => field.identifier === `${command}_title`);
  const value = titleField ? collectedValues.get(titleField.displayLabel)?.trim() : undefined;
  return value ? value : fallback;
};

/** Collects a single-page submission by display label, without a session. */
export const collectByLabel = (
  orderedFields: readonly IFieldSpec[],
  submittedValues: Readonly<Record<string, string>>,
): Map<string, string> => {
  const collected = new Map<string, string>();
  for (const [identifier, value] of Object.entries(submittedValues)) {
    collected.set(resolveLabel(orderedFields, identifier), value);
  }
  return collected;
};
