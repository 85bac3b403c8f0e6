import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  MessageFlags,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
} from "discord.js";
import type { AutocompleteInteraction, Interaction } from "discord.js";
import type {
  IAutocompleteChoice,
  IFormDescriptor,
  IInteractionActor,
  IInteractionResponder,
  IResponsePayload,
  RoutedInteraction,
} from "../../services/interactionTypes.js";
import type { IFieldSpec } from "../../services/issueFormTypes.js";
import {
  markAcknowledged,
  safeDeferReply,
  safeReply,
  type IRepliableInteraction,
} from "./interactionUtils.js";

export const MAX_MESSAGE_LENGTH = 2000;
export const MAX_MODAL_TITLE_LENGTH = 45;
export const MAX_INPUT_LABEL_LENGTH = 45;

const clip = (text: string, max: number): string => {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
};

const buildTextInput = (field: IFieldSpec): TextInputBuilder => {
  const input = new TextInputBuilder()
    .setCustomId(field.identifier)
    .setLabel(clip(field.displayLabel, MAX_INPUT_LABEL_LENGTH))
    .setStyle(field.inputStyle === "paragraph" ? TextInputStyle.Paragraph : TextInputStyle.Short)
    .setRequired(field.required);

  if (field.placeholder) input.setPlaceholder(field.placeholder);
  if (field.minLength !== undefined) input.setMinLength(field.minLength);
  if (field.maxLength !== undefined) input.setMaxLength(field.maxLength);
  return input;
};

export const buildModal = (form: IFormDescriptor): ModalBuilder => {
  return new ModalBuilder()
    .setCustomId(form.customId)
    .setTitle(clip(form.title, MAX_MODAL_TITLE_LENGTH))
    .addComponents(
      form.fields.map((field) => new ActionRowBuilder<TextInputBuilder>().addComponents(buildTextInput(field))),
    );
};

type ResponderTarget =
  | { kind: "repliable"; interaction: IRepliableInteraction }
  | { kind: "autocomplete"; interaction: AutocompleteInteraction };

/** Carries responses from the core back onto the originating discord.js interaction. */
export class DiscordInteractionResponder implements IInteractionResponder {
  constructor(private readonly target: ResponderTarget) {}

  async respond(payload: IResponsePayload): Promise<void> {
    const interaction = this.requireRepliable("respond");

    if (payload.form) {
      if (!interaction.showModal) {
        throw new Error("This interaction cannot open a form.");
      }
      await interaction.showModal(buildModal(payload.form));
      markAcknowledged(interaction);
      return;
    }

    const components = payload.button
      ? [
          new ActionRowBuilder<ButtonBuilder>().addComponents(
            new ButtonBuilder()
              .setCustomId(payload.button.customId)
              .setLabel(payload.button.label)
              .setStyle(ButtonStyle.Primary),
          ),
        ]
      : undefined;

    await safeReply(interaction, {
      content: clip(payload.content ?? "", MAX_MESSAGE_LENGTH),
      components,
      ephemeral: payload.ephemeral,
    });
  }

  async deferReply(options: { ephemeral?: boolean } = {}): Promise<void> {
    await safeDeferReply(this.requireRepliable("deferReply"), {
      flags: options.ephemeral ? MessageFlags.Ephemeral : undefined,
    });
  }

  async editReply(content: string): Promise<void> {
    await safeReply(this.requireRepliable("editReply"), { content: clip(content, MAX_MESSAGE_LENGTH) });
  }

  async respondChoices(choices: readonly IAutocompleteChoice[]): Promise<void> {
    if (this.target.kind !== "autocomplete") {
      throw new Error("Choices can only answer an autocomplete interaction.");
    }
    await this.target.interaction.respond(
      choices.map((choice) => ({ name: choice.name, value: choice.value })),
    );
  }

  private requireRepliable(operation: string): IRepliableInteraction {
    if (this.target.kind !== "repliable") {
      throw new Error(`Cannot ${operation} on an autocomplete interaction.`);
    }
    return this.target.interaction;
  }
}

export interface IRoutedDiscordInteraction {
  event: RoutedInteraction;
  responder: DiscordInteractionResponder;
}

const toActor = (interaction: Interaction): IInteractionActor => ({
  userId: interaction.user.id,
  username: interaction.user.username,
  channelId: interaction.channelId ?? "",
});

const collectOptions = (
  data: readonly { name: string; value?: string | number | boolean }[],
): Record<string, string> => {
  const options: Record<string, string> = {};
  for (const option of data) {
    if (option.value !== undefined) {
      options[option.name] = String(option.value);
    }
  }
  return options;
};

/** Maps a discord.js interaction onto the bot's own event shape; null for kinds it ignores. */
export const toRoutedInteraction = (interaction: Interaction): IRoutedDiscordInteraction | null => {
  if (interaction.isChatInputCommand()) {
    return {
      event: {
        kind: "command",
        commandName: interaction.commandName,
        options: collectOptions(interaction.options.data),
        actor: toActor(interaction),
      },
      responder: new DiscordInteractionResponder({ kind: "repliable", interaction }),
    };
  }

  if (interaction.isAutocomplete()) {
    const focused = interaction.options.getFocused(true);
    return {
      event: {
        kind: "autocomplete",
        commandName: interaction.commandName,
        focused: { name: focused.name, value: String(focused.value) },
        options: collectOptions(interaction.options.data),
        actor: toActor(interaction),
      },
      responder: new DiscordInteractionResponder({ kind: "autocomplete", interaction }),
    };
  }

  if (interaction.isModalSubmit()) {
    const values: Record<string, string> = {};
    interaction.fields.fields.forEach((field, customId) => {
      if ("value" in field && typeof field.value === "string") {
        values[customId] = field.value;
      }
    });
    return {
      event: { kind: "formSubmission", customId: interaction.customId, values, actor: toActor(interaction) },
      responder: new DiscordInteractionResponder({ kind: "repliable", interaction }),
    };
  }

  if (interaction.isButton()) {
    return {
      event: { kind: "buttonClick", customId: interaction.customId, actor: toActor(interaction) },
      responder: new DiscordInteractionResponder({ kind: "repliable", interaction }),
    };
  }

  return null;
};
