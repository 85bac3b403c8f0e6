export const GITHUB_API_BASE = "https://api.github.com";
export const GITHUB_RAW_BASE = "https://raw.githubusercontent.com";
export const GITHUB_API_VERSION = "2022-11-28";

export const ISSUE_SOURCE_LABEL = "from-discord";

export const RELEASE_LIST_LIMIT = 100;
export const CHANGELOG_COMMIT_LIMIT = 10;
export const AUTOCOMPLETE_CHOICE_LIMIT = 25;

export const RELEASE_CACHE_TTL_MS = 60 * 60 * 1000;
export const COMPARISON_CACHE_TTL_MS = 60 * 60 * 1000;
export const REPOSITORY_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const TEMPLATE_CACHE_TTL_MS = 5 * 60 * 1000;

export const REQUEST_TIMEOUT_MS = 15_000;
