import { MessageFlags } from "discord.js";
import type {
  ActionRowBuilder,
  ButtonBuilder,
  InteractionDeferReplyOptions,
  InteractionEditReplyOptions,
  InteractionReplyOptions,
  ModalBuilder,
} from "discord.js";

/**
 * The slice of a discord.js repliable interaction the bot relies on. Chat
 * input, button and modal submit interactions all satisfy it.
 */
export interface IRepliableInteraction {
  readonly deferred: boolean;
  readonly replied: boolean;
  deferReply(options?: InteractionDeferReplyOptions): Promise<unknown>;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  editReply(options: InteractionEditReplyOptions): Promise<unknown>;
  followUp(options: InteractionReplyOptions): Promise<unknown>;
  showModal?(modal: ModalBuilder): Promise<unknown>;
}

export interface IReplyContent {
  content: string;
  components?: ActionRowBuilder<ButtonBuilder>[];
  ephemeral?: boolean;
}

// Unknown interaction / already acknowledged.
const ACK_CODES = new Set([40060, 10062]);

const acknowledged = new WeakSet<IRepliableInteraction>();
const deferredReplies = new WeakSet<IRepliableInteraction>();

const readCode = (value: unknown): unknown => {
  return typeof value === "object" && value !== null && "code" in value ? value.code : undefined;
};

export const isAckError = (err: unknown): boolean => {
  let code = readCode(err);
  if (code === undefined && typeof err === "object" && err !== null && "rawError" in err) {
    code = readCode(err.rawError);
  }
  return typeof code === "number" && ACK_CODES.has(code);
};

export const markAcknowledged = (interaction: IRepliableInteraction): void => {
  acknowledged.add(interaction);
};

export const safeDeferReply = async (
  interaction: IRepliableInteraction,
  options?: InteractionDeferReplyOptions,
): Promise<void> => {
  if (interaction.deferred || interaction.replied || acknowledged.has(interaction)) {
    return;
  }

  try {
    await interaction.deferReply(options);
    acknowledged.add(interaction);
    deferredReplies.add(interaction);
  } catch (err) {
    if (!isAckError(err)) throw err;
  }
};

/**
 * Replies, edits the deferred reply, or follows up, depending on how far the
 * interaction has already been answered.
 */
export const safeReply = async (
  interaction: IRepliableInteraction,
  reply: IReplyContent,
): Promise<void> => {
  const options: InteractionReplyOptions = {
    content: reply.content,
    components: reply.components,
    flags: reply.ephemeral ? MessageFlags.Ephemeral : undefined,
  };
  const deferred = deferredReplies.has(interaction) || interaction.deferred;
  const replied = interaction.replied;

  try {
    if (deferred && !replied) {
      await interaction.editReply({ content: reply.content, components: reply.components });
      return;
    }

    if (replied || acknowledged.has(interaction)) {
      await interaction.followUp(options);
      return;
    }

    await interaction.reply(options);
    acknowledged.add(interaction);
  } catch (err) {
    if (!isAckError(err)) throw err;
  }
};
