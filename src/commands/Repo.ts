import { ApplicationCommandOptionType } from "discord.js";
import type { ChatInputCommandInteraction } from "discord.js";
import { Discord, Slash, SlashOption } from "discordx";
import { dispatchDiscordInteraction } from "../lib/discord/discordDispatch.js";

@Discord()
export class Repo {
  @Slash({ description: "Get the GitHub URL for a repository", name: "repo" })
  async repo(
    @SlashOption({
      description: "Repository name; defaults to the main repository",
      name: "name",
      required: false,
      type: ApplicationCommandOptionType.String,
    })
    _name: string | undefined,
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }
}
