import type { ButtonInteraction, ModalSubmitInteraction } from "discord.js";
import { ButtonComponent, Discord, ModalComponent } from "discordx";
import { dispatchDiscordInteraction } from "../lib/discord/discordDispatch.js";
import { CONTINUE_BUTTON_REGEX, FORM_ID_REGEX } from "../services/modalSessionService.js";

@Discord()
export class IssueFormInteractions {
  @ModalComponent({ id: FORM_ID_REGEX })
  async submitPage(interaction: ModalSubmitInteraction): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }

  @ButtonComponent({ id: CONTINUE_BUTTON_REGEX })
  async continueForm(interaction: ButtonInteraction): Promise<void> {
    await dispatchDiscordInteraction(interaction);
  }
}
