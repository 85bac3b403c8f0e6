import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import dotenv from "dotenv";
import { z } from "zod";

export const DEFAULT_ENVIRONMENT = "dev";
export const DEFAULT_FAQ_PATH = "faq.yaml";
export const DEFAULT_HEALTHCHECK_PORT = 8080;

export interface IBotConfig {
  discordToken: string;
  serverId: string;
  githubToken: string;
  configPath: string;
  faqPath: string;
  healthCheckPort: number;
  removeCommands: boolean;
  logChannelId: string | null;
  /** Overrides the repository taken from the first issue template. */
  githubOwner: string | null;
  githubRepo: string | null;
}

export interface ILoadBotConfigOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

const requiredText = (name: string) => {
  return z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);
};

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || null);

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_VALUES = new Set(["", "0", "f", "F", "FALSE", "false", "False"]);

const booleanFlag = (name: string) => {
  return z
    .union([z.boolean(), z.string()])
    .optional()
    .refine(
      (value) => typeof value !== "string" || TRUE_VALUES.has(value) || FALSE_VALUES.has(value),
      `${name} must be a boolean`,
    )
    .transform((value) => value === true || (typeof value === "string" && TRUE_VALUES.has(value)));
};

const configSchema = z.object({
  DISCORD_TOKEN: requiredText("DISCORD_TOKEN"),
  DISCORD_SERVER_ID: requiredText("DISCORD_SERVER_ID"),
  GITHUB_TOKEN: requiredText("GITHUB_TOKEN"),
  CONFIG_PATH: requiredText("CONFIG_PATH"),
  FAQ_PATH: z.string().trim().min(1).default(DEFAULT_FAQ_PATH),
  HEALTHCHECK_PORT: z.coerce
    .number({ invalid_type_error: "HEALTHCHECK_PORT must be a port number" })
    .int("HEALTHCHECK_PORT must be a port number")
    .min(0, "HEALTHCHECK_PORT must be a port number")
    .max(65535, "HEALTHCHECK_PORT must be a port number")
    .default(DEFAULT_HEALTHCHECK_PORT),
  REMOVE_COMMANDS: booleanFlag("REMOVE_COMMANDS"),
  BOT_LOG_CHANNEL_ID: optionalText,
  GITHUB_OWNER: optionalText,
  GITHUB_REPO: optionalText,
});

type ConfigKey = keyof typeof configSchema.shape;
type RawConfig = Partial<Record<ConfigKey, string | boolean>>;

type StringFlag =
  | "discord-token"
  | "server-id"
  | "github-token"
  | "config-path"
  | "faq-path"
  | "healthcheck-port";

const FLAG_TO_ENV: ReadonlyArray<readonly [StringFlag, ConfigKey]> = [
  ["discord-token", "DISCORD_TOKEN"],
  ["server-id", "DISCORD_SERVER_ID"],
  ["github-token", "GITHUB_TOKEN"],
  ["config-path", "CONFIG_PATH"],
  ["faq-path", "FAQ_PATH"],
  ["healthcheck-port", "HEALTHCHECK_PORT"],
];

/** Reads `.env.{ENV}`, falling back to `.env`; missing files are not an error. */
export const loadEnvFileValues = async (
  environment: string,
  cwd: string,
): Promise<Record<string, string>> => {
  const candidates = [`.env.${environment}`, ".env"];
  for (const fileName of candidates) {
    try {
      const text = await readFile(path.join(cwd, fileName), "utf8");
      console.log(`Loaded configuration from ${fileName}`);
      return dotenv.parse(text);
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }
  console.log("No .env file found, using system environment variables only");
  return {};
};

const isMissingFile = (err: unknown): boolean => {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
};

export const parseConfigFlags = (argv: string[]): RawConfig => {
  const { values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "discord-token": { type: "string" },
      "server-id": { type: "string" },
      "github-token": { type: "string" },
      "config-path": { type: "string" },
      "faq-path": { type: "string" },
      "healthcheck-port": { type: "string" },
      "remove-commands": { type: "boolean" },
    },
  });

  const overrides: RawConfig = {};
  for (const [flag, envName] of FLAG_TO_ENV) {
    const value = values[flag];
    if (value !== undefined) {
      overrides[envName] = value;
    }
  }
  if (values["remove-commands"] !== undefined) {
    overrides.REMOVE_COMMANDS = values["remove-commands"];
  }
  return overrides;
};

const pickEnv = (source: Record<string, string | undefined>): RawConfig => {
  const picked: RawConfig = {};
  for (const key of configSchema.keyof().options) {
    const value = source[key];
    if (value !== undefined && value !== "") {
      picked[key] = value;
    }
  }
  return picked;
};

/** Checks required values and that the modal config path names a file. */
export const validateBotConfig = async (raw: RawConfig): Promise<IBotConfig> => {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const [firstIssue] = result.error.issues;
    throw new Error(`configuration validation failed: ${firstIssue?.message ?? "invalid configuration"}`);
  }

  const parsed = result.data;
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(parsed.CONFIG_PATH)).isDirectory();
  } catch (err) {
    if (isMissingFile(err)) {
      throw new Error(`configuration validation failed: CONFIG_PATH file does not exist: ${parsed.CONFIG_PATH}`);
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`configuration validation failed: CONFIG_PATH error: ${reason}`);
  }
  if (isDirectory) {
    throw new Error(
      `configuration validation failed: CONFIG_PATH must be a file, not a directory: ${parsed.CONFIG_PATH}`,
    );
  }

  return {
    discordToken: parsed.DISCORD_TOKEN,
    serverId: parsed.DISCORD_SERVER_ID,
    githubToken: parsed.GITHUB_TOKEN,
    configPath: parsed.CONFIG_PATH,
    faqPath: parsed.FAQ_PATH,
    healthCheckPort: parsed.HEALTHCHECK_PORT,
    removeCommands: parsed.REMOVE_COMMANDS,
    logChannelId: parsed.BOT_LOG_CHANNEL_ID,
    githubOwner: parsed.GITHUB_OWNER,
    githubRepo: parsed.GITHUB_REPO,
  };
};

/** Defaults < env file < process environment < command-line flags. */
export const loadBotConfig = async (options: ILoadBotConfigOptions = {}): Promise<IBotConfig> => {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const argv = options.argv ?? process.argv.slice(2);

  const fileValues = await loadEnvFileValues(env.ENV || DEFAULT_ENVIRONMENT, cwd);

  return validateBotConfig({
    ...pickEnv(fileValues),
    ...pickEnv(env),
    ...parseConfigFlags(argv),
  });
};
