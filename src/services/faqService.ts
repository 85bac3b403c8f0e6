import { bold } from "@discordjs/builders";
import { filterFaqChoices, findFaqItem, type IFaqData } from "../config/faq.js";
import type { AutocompleteHandler, CommandHandler } from "./interactionTypes.js";

export const FAQ_PROMPT_MESSAGE = "Please select a FAQ topic from the autocomplete options.";
export const FAQ_UNAVAILABLE_MESSAGE = "FAQ data is not available. Please contact an administrator.";

export const createFaqCommandHandler = (faq: IFaqData | null): CommandHandler => {
  return async (event, responder) => {
    const topic = event.options.topic?.trim() ?? "";
    if (!topic) {
      await responder.respond({ content: FAQ_PROMPT_MESSAGE, ephemeral: true });
      return;
    }
    if (!faq) {
      await responder.respond({ content: FAQ_UNAVAILABLE_MESSAGE, ephemeral: true });
      return;
    }

    const item = findFaqItem(faq, topic);
    if (!item) {
      await responder.respond({ content: `FAQ topic '${topic}' not found.`, ephemeral: true });
      return;
    }

    await responder.respond({ content: `${bold(item.name)}\n${item.url}` });
  };
};

export const createFaqAutocompleteHandler = (faq: IFaqData | null): AutocompleteHandler => {
  return async (event, responder) => {
    await responder.respondChoices(faq ? filterFaqChoices(faq, event.focused.value) : []);
  };
};
