import { ApplicationCommandOptionType } from "discord.js";
import type { AutocompleteInteraction, ChatInputCommandInteraction } from "discord.js";
import { Discord, Slash, SlashOption } from "discordx";
import { dispatchDiscordInteraction } from "../lib/discord/discordDispatch.js";

@Discord()
export class Faq {
  // Autocomplete requests for `topic` arrive here as well.
  @Slash({ description: "Frequently Asked Questions", name: "faq" })
  async faq(
    @SlashOption({
      description: "Select a FAQ topic",
      name: "topic",
      required: true,
      type: ApplicationCommandOptionType.String,
      autocomplete: true,
    })
    _topic: string | undefined,
    interaction: ChatInputCommandInteraction | AutocompleteInteraction,
  ): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }
}
