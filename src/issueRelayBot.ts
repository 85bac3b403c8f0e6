import "reflect-metadata";
import { dirname, importx } from "@discordx/importer";
import { Client } from "discordx";
import { Events, GatewayIntentBits } from "discord.js";
import type { Interaction } from "discord.js";
import type { Server } from "node:http";
import { initBotContext } from "./botContext.js";
import { loadBotConfig, type IBotConfig } from "./config/env.js";
import { loadFaqData, type IFaqData } from "./config/faq.js";
import { loadModalsConfig } from "./config/modals.js";
import {
  installConsoleLogging,
  setConsoleLoggingClient,
  stopConsoleLogging,
} from "./lib/discord/consoleLogger.js";
import { runListener } from "./lib/discord/discordDispatch.js";
import { startHealthServer, stopHealthServer } from "./lib/web/healthServer.js";
import { GithubRestClient } from "./services/githubService.js";
import { createTemplateFetcher } from "./services/issueTemplateService.js";

installConsoleLogging();

const loadFaqOrNull = async (faqPath: string): Promise<IFaqData | null> => {
  try {
    return await loadFaqData(faqPath);
  } catch (err) {
    console.warn(`Failed to load FAQ data from ${faqPath}; /faq will be unavailable:`, err);
    return null;
  }
};

const createClient = (config: IBotConfig): Client => {
  const client = new Client({
    intents: [GatewayIntentBits.Guilds],
    botGuilds: [config.serverId],
    silent: false,
  });

  client.once(Events.ClientReady, () => {
    const onReady = async () => {
      await client.initApplicationCommands();
      setConsoleLoggingClient(client, config.logChannelId);
      console.log(`Logged in as ${client.user?.tag ?? "unknown user"}`);
    };
    onReady().catch((err) => {
      console.error("Failed to register application commands:", err);
    });
  });

  client.on(Events.InteractionCreate, (interaction: Interaction) => {
    void runListener("Discord client error:", () => client.executeInteraction(interaction));
  });

  return client;
};

const registerShutdown = (client: Client, server: Server, config: IBotConfig): void => {
  let stopping = false;

  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, shutting down...`);

    if (config.removeCommands) {
      console.log("Removing registered commands...");
      try {
        await client.clearApplicationCommands(config.serverId);
      } catch (err) {
        console.error("Failed to remove commands:", err);
      }
    }

    try {
      await stopHealthServer(server);
    } catch (err) {
      console.error("Failed to stop the health check server:", err);
    }

    await stopConsoleLogging();
    await client.destroy();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("Shutdown failed:", err);
        process.exitCode = 1;
      });
    });
  }
};

const start = async () => {
  const config = await loadBotConfig();
  const modals = await loadModalsConfig(config.configPath);
  const faq = await loadFaqOrNull(config.faqPath);

  const context = initBotContext({
    modals,
    faq,
    github: new GithubRestClient({ token: config.githubToken }),
    fetchTemplate: createTemplateFetcher(),
    repositoryOverride: {
      owner: config.githubOwner ?? undefined,
      repo: config.githubRepo ?? undefined,
    },
  });
  console.log(`Loaded ${modals.modals.length} issue form(s); commands: ${context.router.commandNames.join(", ")}`);

  const client = createClient(config);

  const _dirname = dirname(import.meta.url);
  await importx(`${_dirname}/commands/**/*.{ts,js}`);

  const server = await startHealthServer(config.healthCheckPort, () => client.isReady());
  registerShutdown(client, server, config);

  try {
    await client.login(config.discordToken);
  } catch (err) {
    await stopHealthServer(server);
    throw err;
  }
};

start().catch((error) => {
  console.error("Failed to start the issue relay bot:", error);
  process.exitCode = 1;
});
