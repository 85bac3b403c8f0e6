import { ApplicationCommandOptionType } from "discord.js";
import type { AutocompleteInteraction, ChatInputCommandInteraction } from "discord.js";
import { Discord, Slash, SlashOption } from "discordx";
import { dispatchDiscordInteraction } from "../lib/discord/discordDispatch.js";

@Discord()
export class Changelog {
  @Slash({ description: "View changes between two versions", name: "changelog" })
  async changelog(
    @SlashOption({
      description: "The base version (e.g. v2.6.0)",
      name: "base",
      required: true,
      type: ApplicationCommandOptionType.String,
      autocomplete: true,
    })
    _base: string | undefined,
    @SlashOption({
      description: "The head version (e.g. v2.6.4)",
      name: "head",
      required: true,
      type: ApplicationCommandOptionType.String,
      autocomplete: true,
    })
    _head: string | undefined,
    interaction: ChatInputCommandInteraction | AutocompleteInteraction,
  ): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }
}
