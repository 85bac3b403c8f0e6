import { EmbedBuilder } from "discord.js";
import type { Client, SendableChannels } from "discord.js";

const MAX_DESCRIPTION_LENGTH = 3900;
const CODE_BLOCK_OVERHEAD = 8;
const LOG_BATCH_INTERVAL = 15 * 1000;

type ConsoleLevel = "log" | "error" | "warn" | "info" | "debug";

const LEVEL_COLORS: Record<ConsoleLevel, number> = {
  log: 0x95a5a6,
  info: 0x3498db,
  warn: 0xf39c12,
  error: 0xe74c3c,
  debug: 0x9b59b6,
};

const originalConsole = {
  log: console.log.bind(console),
  error: console.error.bind(console),
  warn: console.warn.bind(console),
  info: console.info.bind(console),
  debug: console.debug.bind(console),
};

let discordClient: Client | null = null;
let logChannelId: string | null = null;
let logChannel: SendableChannels | null = null;
let resolvingChannel = false;
let installed = false;
let logBuffer: { time: number; message: string }[] = [];
let logBufferTimer: NodeJS.Timeout | null = null;

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.stack ?? a.message;
      try {
        return JSON.stringify(a);
      } catch {
        return String(a);
      }
    })
    .join(" ");
}

// Interaction acknowledgement races are expected under load and not worth a channel post.
function isAckNoise(level: ConsoleLevel, message: string): boolean {
  return (
    level === "error" &&
    (message.includes("DiscordAPIError[40060]") || message.includes("DiscordAPIError[10062]"))
  );
}

function wrapInCodeBlock(text: string): string {
  return `\`\`\`\n${text}\n\`\`\``;
}

/** Packs batched lines into as few embed descriptions as fit. */
function chunkLogLines(lines: string[]): string[] {
  const limit = MAX_DESCRIPTION_LENGTH - CODE_BLOCK_OVERHEAD;
  const chunks: string[] = [];
  let current = "";

  for (const rawLine of lines) {
    const line = rawLine.length > limit ? `${rawLine.slice(0, limit - 3)}...` : rawLine;
    if (current && current.length + line.length + 1 > limit) {
      chunks.push(current);
      current = "";
    }
    current = current ? `${current}\n${line}` : line;
  }

  if (current) chunks.push(current);
  return chunks;
}

function formatLevelMessage(level: ConsoleLevel, message: string): string {
  const text = `[${level.toUpperCase()}] ${message}`;
  const wrap = level === "error" || level === "warn";
  const limit = wrap ? MAX_DESCRIPTION_LENGTH - CODE_BLOCK_OVERHEAD : MAX_DESCRIPTION_LENGTH;
  const trimmed = text.length > limit ? `${text.slice(0, limit - 3)}...` : text;
  return wrap ? wrapInCodeBlock(trimmed) : trimmed;
}

async function ensureChannel(): Promise<SendableChannels | null> {
  if (!discordClient || !logChannelId) return null;
  if (logChannel) return logChannel;
  if (resolvingChannel) return logChannel;

  resolvingChannel = true;
  try {
    const channel = await discordClient.channels.fetch(logChannelId);
    if (channel && channel.isSendable()) {
      logChannel = channel;
    }
  } catch (err) {
    originalConsole.error(`[console-logger] Could not fetch log channel ${logChannelId}:`, err);
  } finally {
    resolvingChannel = false;
  }

  return logChannel;
}

async function flushLogBuffer(): Promise<void> {
  if (logBuffer.length === 0) return;

  const logsToSend = [...logBuffer].sort((a, b) => a.time - b.time);
  logBuffer = [];

  const channel = await ensureChannel();
  if (!channel) return;

  try {
    for (const chunk of chunkLogLines(logsToSend.map((item) => item.message))) {
      const embed = new EmbedBuilder()
        .setDescription(wrapInCodeBlock(chunk))
        .setColor(LEVEL_COLORS.log)
        .setTimestamp(new Date());
      await channel.send({ embeds: [embed] });
    }
  } catch (err) {
    originalConsole.error("[console-logger] Failed to flush log batch:", err);
  }
}

async function sendToDiscord(level: ConsoleLevel, message: string): Promise<void> {
  if (!discordClient || !logChannelId) return;

  if (level === "log") {
    logBuffer.push({ time: Date.now(), message });
    if (!logBufferTimer) {
      logBufferTimer = setInterval(() => void flushLogBuffer(), LOG_BATCH_INTERVAL);
      logBufferTimer.unref();
    }
    return;
  }

  if (isAckNoise(level, message)) return;

  try {
    const channel = await ensureChannel();
    if (!channel) return;

    const embed = new EmbedBuilder()
      .setDescription(formatLevelMessage(level, message))
      .setColor(LEVEL_COLORS[level])
      .setTimestamp(new Date());
    await channel.send({ embeds: [embed] });
  } catch (err) {
    // Original console only, or the failure would loop back here.
    originalConsole.error("[console-logger] Failed to mirror a console line:", err);
  }
}

/** Mirrors console output to the bot log channel once a client is set. */
export function installConsoleLogging(): void {
  if (installed) return;
  installed = true;

  const levels: ConsoleLevel[] = ["log", "error", "warn", "info", "debug"];
  for (const level of levels) {
    console[level] = (...args: unknown[]) => {
      originalConsole[level](...args);
      void sendToDiscord(level, formatArgs(args));
    };
  }
}

export function setConsoleLoggingClient(client: Client, channelId: string | null): void {
  discordClient = client;
  logChannelId = channelId;
  logChannel = null;
}

/** Sends whatever is still batched and stops the batch timer. */
export async function stopConsoleLogging(): Promise<void> {
  if (logBufferTimer) {
    clearInterval(logBufferTimer);
    logBufferTimer = null;
  }
  await flushLogBuffer();
  discordClient = null;
}

export const __consoleLoggerTestables = {
  formatArgs,
  isAckNoise,
  chunkLogLines,
  formatLevelMessage,
};
