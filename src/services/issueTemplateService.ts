import axios, { type AxiosAdapter } from "axios";
import { z } from "zod";
import { REQUEST_TIMEOUT_MS } from "../config/github.js";
import { parseYamlDocument } from "../config/yamlDocument.js";
import type { IFieldSpec } from "./issueFormTypes.js";

const INPUT_MAX_LENGTH = 100;
const TEXTAREA_MAX_LENGTH = 4000;
const NON_INTERACTIVE_TYPES = new Set(["markdown", "checkboxes"]);

const optionalText = z
  .union([z.string(), z.bigint(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

const templateFieldSchema = z.object({
  type: z.string(),
  id: optionalText,
  attributes: z
    .object({
      label: optionalText,
      description: optionalText,
      placeholder: optionalText,
    })
    .nullish(),
  validations: z
    .object({
      required: z.boolean().nullish(),
    })
    .nullish(),
});

export const issueTemplateSchema = z.object({
  name: optionalText,
  description: optionalText,
  title: optionalText,
  body: z.array(templateFieldSchema).nullish().transform((body) => body ?? []),
});

export type IIssueTemplate = z.output<typeof issueTemplateSchema>;
export type IIssueTemplateField = IIssueTemplate["body"][number];

export type TemplateFetcher = (rawUrl: string) => Promise<string>;

/**
 * Maps an issue-form body entry onto a modal input. Informational entries
 * (`markdown`, `checkboxes`) have no input and yield `null`.
 */
export const convertTemplateField = (
  field: IIssueTemplateField,
  index: number,
): IFieldSpec | null => {
  if (NON_INTERACTIVE_TYPES.has(field.type)) return null;

  const identifier = field.id || `field_${index + 1}`;
  const base = {
    identifier,
    displayLabel: field.attributes?.label || identifier,
    placeholder: field.attributes?.placeholder ?? "",
    required: field.validations?.required ?? false,
  };

  switch (field.type) {
    case "textarea":
      return { ...base, inputStyle: "paragraph", minLength: 1, maxLength: TEXTAREA_MAX_LENGTH };
    case "input":
      return { ...base, inputStyle: "short", minLength: 1, maxLength: INPUT_MAX_LENGTH };
    default:
      return { ...base, inputStyle: "short" };
  }
};

/**
 * Interactive fields of a template. A label already taken by an earlier field
 * is replaced with the field's identifier; a repeated identifier is an error.
 */
export const getTemplateFieldSpecs = (template: IIssueTemplate): IFieldSpec[] => {
  const identifiers = new Set<string>();
  const labels = new Set<string>();
  const specs: IFieldSpec[] = [];

  template.body.forEach((field, index) => {
    const spec = convertTemplateField(field, index);
    if (!spec) return;

    if (identifiers.has(spec.identifier)) {
      throw new Error(`duplicate field id "${spec.identifier}" in issue template`);
    }
    const displayLabel = labels.has(spec.displayLabel) ? spec.identifier : spec.displayLabel;
    if (labels.has(displayLabel)) {
      throw new Error(`duplicate field label "${displayLabel}" in issue template`);
    }

    identifiers.add(spec.identifier);
    labels.add(displayLabel);
    specs.push({ ...spec, displayLabel });
  });

  return specs;
};

export const parseIssueTemplate = (text: string, source: string): IIssueTemplate => {
  return parseYamlDocument(text, issueTemplateSchema, source);
};

export const createTemplateFetcher = (adapter?: AxiosAdapter): TemplateFetcher => {
  const http = axios.create({ timeout: REQUEST_TIMEOUT_MS, adapter, responseType: "text" });

  return async (rawUrl) => {
    const response = await http.get<unknown>(rawUrl);
    if (typeof response.data !== "string") {
      throw new Error(`failed to fetch template from ${rawUrl}: unexpected response body`);
    }
    return response.data;
  };
};

export const fetchTemplateFields = async (
  fetchTemplate: TemplateFetcher,
  rawUrl: string,
): Promise<IFieldSpec[]> => {
  const text = await fetchTemplate(rawUrl);
  return getTemplateFieldSpecs(parseIssueTemplate(text, rawUrl));
};
