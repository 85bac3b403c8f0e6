import type { IFieldSpec } from "./issueFormTypes.js";

export interface IInteractionActor {
  userId: string;
  username: string;
  channelId: string;
}

export interface ICommandEvent {
  kind: "command";
  commandName: string;
  /** String form of every option the user supplied. */
  options: Record<string, string>;
  actor: IInteractionActor;
}

export interface IAutocompleteEvent {
  kind: "autocomplete";
  commandName: string;
  focused: { name: string; value: string };
  options: Record<string, string>;
  actor: IInteractionActor;
}

export interface IFormSubmissionEvent {
  kind: "formSubmission";
  customId: string;
  /** Submitted text keyed by input custom id. */
  values: Record<string, string>;
  actor: IInteractionActor;
}

export interface IButtonClickEvent {
  kind: "buttonClick";
  customId: string;
  actor: IInteractionActor;
}

export type RoutedInteraction =
  | ICommandEvent
  | IAutocompleteEvent
  | IFormSubmissionEvent
  | IButtonClickEvent;

export interface IFormDescriptor {
  customId: string;
  title: string;
  fields: readonly IFieldSpec[];
}

export interface IButtonDescriptor {
  customId: string;
  label: string;
}

export interface IResponsePayload {
  content?: string;
  ephemeral?: boolean;
  /** Shown as a modal; must be the first response to the interaction. */
  form?: IFormDescriptor;
  button?: IButtonDescriptor;
}

export interface IAutocompleteChoice {
  name: string;
  value: string;
}

export interface IInteractionResponder {
  respond(payload: IResponsePayload): Promise<void>;
  deferReply(options?: { ephemeral?: boolean }): Promise<void>;
  editReply(content: string): Promise<void>;
  respondChoices(choices: readonly IAutocompleteChoice[]): Promise<void>;
}

export type CommandHandler = (
  event: ICommandEvent,
  responder: IInteractionResponder,
) => Promise<void>;

export type AutocompleteHandler = (
  event: IAutocompleteEvent,
  responder: IInteractionResponder,
) => Promise<void>;
