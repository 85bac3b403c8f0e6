import type { ChatInputCommandInteraction } from "discord.js";
import { Discord, Slash } from "discordx";
import { ISSUE_COMMANDS } from "../config/issueCommands.js";
import { dispatchDiscordInteraction } from "../lib/discord/discordDispatch.js";

/** `/bug` and `/feature` open the channel's issue form. */
@Discord()
export class Issues {
  @Slash({ description: ISSUE_COMMANDS.bug.description, name: ISSUE_COMMANDS.bug.name })
  async bug(interaction: ChatInputCommandInteraction): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }

  @Slash({ description: ISSUE_COMMANDS.feature.description, name: ISSUE_COMMANDS.feature.name })
  async feature(interaction: ChatInputCommandInteraction): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }
}
