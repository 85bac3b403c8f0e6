import { z } from "zod";
import { GITHUB_RAW_BASE } from "./github.js";
import { parseYamlDocument, readYamlFile } from "./yamlDocument.js";
import type { IFieldSpec } from "../services/issueFormTypes.js";

/** Snowflakes are read as bigint to keep every digit. */
const snowflakeSchema = z.union([z.string(), z.bigint(), z.number()]).transform(String);
const lengthSchema = z.union([z.bigint(), z.number()]).transform(Number);

const fieldConfigSchema = z.object({
  custom_id: z.string().min(1),
  label: z.string().min(1),
  style: z.enum(["short", "paragraph"]).default("short"),
  placeholder: z.string().nullish().transform((value) => value ?? ""),
  required: z.boolean().default(false),
  min_length: lengthSchema.optional(),
  max_length: lengthSchema.optional(),
});

const modalConfigSchema = z.object({
  command: z.string().min(1),
  template_url: z.string().nullish(),
  channel_id: z.array(snowflakeSchema).nullish().transform((ids) => ids ?? []),
  title: z.string().min(1),
  fields: z.array(fieldConfigSchema).nullish().transform((fields) => fields ?? []),
}).superRefine((modal, ctx) => {
  // Submitted values are keyed by label, so both keys must be unique per form.
  for (const key of ["custom_id", "label"] as const) {
    const seen = new Set<string>();
    modal.fields.forEach((field, index) => {
      const value = field[key];
      if (seen.has(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", index, key],
          message: `duplicate field ${key} "${value}" in command ${modal.command}`,
        });
      }
      seen.add(value);
    });
  }
});

export const modalsConfigSchema = z.object({
  config: z.array(modalConfigSchema).nullish().transform((modals) => modals ?? []),
});

export interface ITemplateUrl {
  original: string;
  owner: string;
  repo: string;
  /** Everything after `owner/repo/`, e.g. `blob/main/.github/ISSUE_TEMPLATE/bug.yml`. */
  path: string;
}

export interface IModalConfig {
  command: string;
  templateUrl: ITemplateUrl | null;
  channelIds: string[];
  title: string;
  /** Used when no template is configured. */
  fields: IFieldSpec[];
}

export interface IModalsConfig {
  modals: IModalConfig[];
}

export interface IRepositoryTarget {
  owner: string;
  repo: string;
}

export const parseTemplateUrl = (templateUrl: string): ITemplateUrl => {
  if (!templateUrl) {
    throw new Error("template URL cannot be empty");
  }

  let url = templateUrl;
  for (const prefix of ["https://", "http://", "github.com/"]) {
    if (url.startsWith(prefix)) {
      url = url.slice(prefix.length);
    }
  }

  const parts = url.split("/");
  const [owner, repo] = parts;
  if (parts.length < 2 || !owner || !repo) {
    throw new Error(`invalid GitHub URL format: ${templateUrl}`);
  }

  return { original: templateUrl, owner, repo, path: parts.slice(2).join("/") };
};

export const toRawTemplateUrl = (templateUrl: ITemplateUrl): string => {
  const path = templateUrl.path.replace("blob/", "");
  return `${GITHUB_RAW_BASE}/${templateUrl.owner}/${templateUrl.repo}/${path}`;
};

type RawModalsConfig = z.output<typeof modalsConfigSchema>;
type RawFieldConfig = RawModalsConfig["config"][number]["fields"][number];

const toFieldSpec = (field: RawFieldConfig): IFieldSpec => {
  return {
    identifier: field.custom_id,
    displayLabel: field.label,
    inputStyle: field.style,
    placeholder: field.placeholder,
    required: field.required,
    ...(field.min_length && field.min_length > 0 ? { minLength: field.min_length } : {}),
    ...(field.max_length && field.max_length > 0 ? { maxLength: field.max_length } : {}),
  };
};

const toModalsConfig = (raw: RawModalsConfig): IModalsConfig => {
  const modals = raw.config.map((modal): IModalConfig => {
    let templateUrl: ITemplateUrl | null = null;
    if (modal.template_url) {
      try {
        templateUrl = parseTemplateUrl(modal.template_url);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`failed to parse template URL for command ${modal.command}: ${reason}`);
      }
    }

    return {
      command: modal.command,
      templateUrl,
      channelIds: modal.channel_id,
      title: modal.title,
      fields: modal.fields.map(toFieldSpec),
    };
  });

  return { modals };
};

export const parseModalsConfig = (text: string, source = "modal config"): IModalsConfig => {
  return toModalsConfig(parseYamlDocument(text, modalsConfigSchema, source));
};

export const loadModalsConfig = async (filePath: string): Promise<IModalsConfig> => {
  return toModalsConfig(await readYamlFile(filePath, modalsConfigSchema));
};

/** First modal for the command that lists the channel. */
export const findModalConfig = (
  config: IModalsConfig,
  command: string,
  channelId: string,
): IModalConfig | null => {
  const match = config.modals.find((modal) => {
    return modal.command === command && modal.channelIds.includes(channelId);
  });
  return match ?? null;
};

/** The explicit override, else the repository of the first templated modal. */
export const getDefaultRepository = (
  config: IModalsConfig,
  override?: Partial<IRepositoryTarget>,
): IRepositoryTarget | null => {
  if (override?.owner && override.repo) {
    return { owner: override.owner, repo: override.repo };
  }

  for (const modal of config.modals) {
    if (modal.templateUrl) {
      return { owner: modal.templateUrl.owner, repo: modal.templateUrl.repo };
    }
  }
  return null;
};
