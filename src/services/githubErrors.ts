import axios from "axios";

const readGithubMessage = (data: unknown): string | undefined => {
  if (typeof data !== "object" || data === null || !("message" in data)) return undefined;
  const { message } = data;
  return typeof message === "string" && message ? message : undefined;
};

/** One-line summary of a failed GitHub call, for logs. */
export const describeGithubError = (error: unknown): string => {
  const outputParts: string[] = [];

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const githubMessage = readGithubMessage(error.response?.data);
    if (status) {
      outputParts.push(`GitHub status: ${status}`);
    }
    if (githubMessage) {
      outputParts.push(`GitHub error: ${githubMessage}`);
    } else if (error.message) {
      outputParts.push(`GitHub error: ${error.message}`);
    }
  } else if (error instanceof Error && error.message) {
    outputParts.push(`GitHub error: ${error.message}`);
  }

  if (outputParts.length) {
    return outputParts.join(", ");
  }
  return "GitHub request failed.";
};
