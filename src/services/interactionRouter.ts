import { parseContinueButtonId, parseFormId } from "./modalSessionService.js";
import type { IssueFormService } from "./issueFormService.js";
import type {
  AutocompleteHandler,
  CommandHandler,
  IInteractionResponder,
  RoutedInteraction,
} from "./interactionTypes.js";

export const GENERIC_FAILURE_MESSAGE = "❌ Something went wrong while handling that request. Please try again later.";

const describeInteraction = (event: RoutedInteraction): string => {
  switch (event.kind) {
    case "command":
    case "autocomplete":
      return `${event.kind} /${event.commandName}`;
    case "formSubmission":
    case "buttonClick":
      return `${event.kind} ${event.customId}`;
  }
};

/**
 * Single entry point for inbound interactions. Commands and autocomplete go
 * through name registries; form and button ids are decoded here and handed
 * to the issue form flow. Nothing thrown by a handler escapes `dispatch`.
 */
export class InteractionRouter {
  private readonly commands = new Map<string, CommandHandler>();
  private readonly autocompletes = new Map<string, AutocompleteHandler>();

  constructor(private readonly issueForms: IssueFormService) {}

  get commandNames(): string[] {
    return [...this.commands.keys()];
  }

  registerCommand(name: string, handler: CommandHandler): this {
    this.commands.set(name, handler);
    return this;
  }

  registerAutocomplete(name: string, handler: AutocompleteHandler): this {
    this.autocompletes.set(name, handler);
    return this;
  }

  async dispatch(event: RoutedInteraction, responder: IInteractionResponder): Promise<void> {
    try {
      await this.route(event, responder);
    } catch (err) {
      console.error(`[router] Failed to handle ${describeInteraction(event)}:`, err);
      await this.replyWithFailure(event, responder);
    }
  }

  private async route(event: RoutedInteraction, responder: IInteractionResponder): Promise<void> {
    switch (event.kind) {
      case "command": {
        const handler = this.commands.get(event.commandName);
        if (!handler) return;
        await handler(event, responder);
        return;
      }
      case "autocomplete": {
        const handler = this.autocompletes.get(event.commandName);
        if (!handler) return;
        await handler(event, responder);
        return;
      }
      case "formSubmission": {
        const route = parseFormId(event.customId);
        if (!route) {
          console.warn(`[router] Invalid modal custom id format: ${event.customId}`);
          return;
        }
        await this.issueForms.submitForm(route, event.values, event.actor, responder);
        return;
      }
      case "buttonClick": {
        const sessionKey = parseContinueButtonId(event.customId);
        if (sessionKey === null) {
          console.warn(`[router] Unrecognized button custom id: ${event.customId}`);
          return;
        }
        await this.issueForms.showNextPage(sessionKey, responder);
        return;
      }
    }
  }

  private async replyWithFailure(
    event: RoutedInteraction,
    responder: IInteractionResponder,
  ): Promise<void> {
    try {
      if (event.kind === "autocomplete") {
        await responder.respondChoices([]);
        return;
      }
      await responder.respond({ content: GENERIC_FAILURE_MESSAGE, ephemeral: true });
    } catch (err) {
      console.error(`[router] Could not report the failure of ${describeInteraction(event)}:`, err);
    }
  }
}
