import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";

export const formatSchemaIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
};

/**
 * Parses YAML text and validates it. Integers are read as bigint so
 * Discord snowflakes survive; schemas convert them back to strings.
 */
export const parseYamlDocument = <T extends z.ZodTypeAny>(
  text: string,
  schema: T,
  source: string,
): z.output<T> => {
  let document: unknown;
  try {
    document = text.trim() ? (parseYaml(text, { intAsBigInt: true }) ?? {}) : {};
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse YAML from ${source}: ${reason}`);
  }

  const result = schema.safeParse(document);
  if (!result.success) {
    throw new Error(`Invalid ${source}: ${formatSchemaIssues(result.error)}`);
  }
  return result.data;
};

export const readYamlFile = async <T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
): Promise<z.output<T>> => {
  const text = await readFile(filePath, "utf8");
  return parseYamlDocument(text, schema, filePath);
};
