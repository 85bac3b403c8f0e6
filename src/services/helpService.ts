import { bold, inlineCode } from "@discordjs/builders";
import type { CommandHandler } from "./interactionTypes.js";

const COMMAND_SUMMARIES: [string, string][] = [
  ["bug", "To report a bug with the app."],
  ["feature", "To request a new feature."],
  ["faq", "Frequently Asked Questions."],
  ["changelog", "View changes between two versions."],
  ["repo", "Get the GitHub URL for a repository."],
];

export const buildHelpText = (): string => {
  const lines = COMMAND_SUMMARIES.map(([name, summary]) => `${inlineCode(`/${name}`)}: ${summary}`);
  return [bold("How to get help or make a suggestion:"), ...lines].join("\n");
};

export const createTapsignHandler = (): CommandHandler => {
  return async (_event, responder) => {
    await responder.respond({ content: buildHelpText() });
  };
};
