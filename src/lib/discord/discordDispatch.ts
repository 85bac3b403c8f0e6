import type { Interaction } from "discord.js";
import { getBotContext } from "../../botContext.js";
import { toRoutedInteraction } from "./discordResponder.js";

export const dispatchDiscordInteraction = async (interaction: Interaction): Promise<void> => {
  const routed = toRoutedInteraction(interaction);
  if (!routed) return;
  await getBotContext().router.dispatch(routed.event, routed.responder);
};

/**
 * Awaits a listener body that may return a plain value or a promise and logs
 * whatever it throws. Never rejects.
 */
export const runListener = async (label: string, task: () => unknown): Promise<void> => {
  try {
    await task();
  } catch (err) {
    console.error(label, err);
  }
};
