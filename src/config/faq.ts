import { z } from "zod";
import { AUTOCOMPLETE_CHOICE_LIMIT } from "./github.js";
import { readYamlFile } from "./yamlDocument.js";

const faqItemSchema = z.object({
  name: z.union([z.string(), z.bigint()]).transform(String),
  url: z.string(),
});

const faqListSchema = z
  .array(faqItemSchema)
  .nullish()
  .transform((items) => items ?? []);

export const faqDataSchema = z.object({
  faq: faqListSchema,
  software_modules: faqListSchema,
});

export type IFaqItem = z.output<typeof faqItemSchema>;
export type IFaqData = z.output<typeof faqDataSchema>;

export const loadFaqData = async (filePath: string): Promise<IFaqData> => {
  return readYamlFile(filePath, faqDataSchema);
};

export const getAllFaqItems = (data: IFaqData): IFaqItem[] => {
  return [...data.faq, ...data.software_modules];
};

/** Exact name match; general FAQ entries win over software modules. */
export const findFaqItem = (data: IFaqData, name: string): IFaqItem | null => {
  return getAllFaqItems(data).find((item) => item.name === name) ?? null;
};

export const filterFaqChoices = (
  data: IFaqData,
  query: string,
): { name: string; value: string }[] => {
  const needle = query.trim().toLowerCase();
  return getAllFaqItems(data)
    .filter((item) => !needle || item.name.toLowerCase().includes(needle))
    .slice(0, AUTOCOMPLETE_CHOICE_LIMIT)
    .map((item) => ({ name: item.name, value: item.name }));
};
