export type IssueCommandName = "bug" | "feature";

export interface IIssueCommandDefinition {
  name: IssueCommandName;
  description: string;
  /** Used in "the ... command is not configured" replies. */
  displayName: string;
  typeLabel: string;
}

export const ISSUE_COMMANDS: Record<IssueCommandName, IIssueCommandDefinition> = {
  bug: {
    name: "bug",
    description: "Submit a bug report",
    displayName: "bug report",
    typeLabel: "bug",
  },
  feature: {
    name: "feature",
    description: "Request a new feature",
    displayName: "feature request",
    typeLabel: "enhancement",
  },
};

export const isIssueCommand = (command: string): command is IssueCommandName => {
  return command === "bug" || command === "feature";
};
