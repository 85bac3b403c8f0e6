import type { ChatInputCommandInteraction } from "discord.js";
import { Discord, Slash } from "discordx";
import { dispatchDiscordInteraction } from "../lib/discord/discordDispatch.js";

@Discord()
export class Tapsign {
  @Slash({ description: "Display a short help message in the channel", name: "tapsign" })
  async tapsign(interaction: ChatInputCommandInteraction): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }
}
