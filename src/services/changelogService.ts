import { hideLinkEmbed, hyperlink, inlineCode, italic } from "@discordjs/builders";
import { KeyedTtlCache, TtlCache, type Clock } from "../lib/cache/ttlCache.js";
import {
  AUTOCOMPLETE_CHOICE_LIMIT,
  CHANGELOG_COMMIT_LIMIT,
  COMPARISON_CACHE_TTL_MS,
  RELEASE_CACHE_TTL_MS,
  RELEASE_LIST_LIMIT,
} from "../config/github.js";
import type { IGithubClient, IGithubComparison, IGithubRelease } from "./githubService.js";
import type {
  AutocompleteHandler,
  CommandHandler,
  IAutocompleteChoice,
} from "./interactionTypes.js";
import { describeGithubError } from "./githubErrors.js";

const SHORT_SHA_LENGTH = 7;

export interface IRepositoryRef {
  owner: string;
  repo: string;
}

const firstLine = (message: string): string => {
  const newline = message.indexOf("\n");
  return newline === -1 ? message : message.slice(0, newline);
};

export const formatChangelogMessage = (
  base: string,
  head: string,
  comparison: IGithubComparison,
): string => {
  let message = `## Changes from ${base} to ${head}\nTotal commits: ${comparison.totalCommits}\n\n`;

  let commits = comparison.commits;
  if (commits.length > CHANGELOG_COMMIT_LIMIT) {
    message += `${italic(`Showing last ${CHANGELOG_COMMIT_LIMIT} of ${commits.length} commits`)}\n\n`;
    commits = commits.slice(-CHANGELOG_COMMIT_LIMIT);
  }

  for (const commit of commits) {
    const sha = inlineCode(commit.sha.slice(0, SHORT_SHA_LENGTH));
    const link = hyperlink(sha, hideLinkEmbed(commit.htmlUrl));
    message += `- ${link} ${firstLine(commit.message)} - ${italic(commit.author)}\n`;
  }

  message += `\n${hyperlink("View Full Comparison", hideLinkEmbed(comparison.htmlUrl))}`;
  return message;
};

export const filterReleaseChoices = (
  releases: readonly IGithubRelease[],
  query: string,
): IAutocompleteChoice[] => {
  const needle = query.trim().toLowerCase();
  return releases
    .filter((release) => !needle || release.tagName.toLowerCase().includes(needle))
    .slice(0, AUTOCOMPLETE_CHOICE_LIMIT)
    .map((release) => ({ name: release.tagName, value: release.tagName }));
};

/**
 * Release listings and comparison messages for the default repository, each
 * memoized for an hour.
 */
export class ChangelogService {
  private readonly releases: TtlCache<IGithubRelease[]>;
  private readonly comparisons: KeyedTtlCache<string>;

  constructor(
    private readonly github: IGithubClient,
    private readonly repository: IRepositoryRef,
    now?: Clock,
  ) {
    this.releases = new TtlCache<IGithubRelease[]>(RELEASE_CACHE_TTL_MS, {
      now,
      isPresent: (payload) => payload.length > 0,
    });
    this.comparisons = new KeyedTtlCache<string>(COMPARISON_CACHE_TTL_MS, { now });
  }

  /** Falls back to the last known list, or none, when the refresh fails. */
  async getReleaseChoices(query: string): Promise<IAutocompleteChoice[]> {
    let releases: IGithubRelease[];
    try {
      releases = await this.releases.getOrFetch(() => {
        const { owner, repo } = this.repository;
        return this.github.listReleases(owner, repo, RELEASE_LIST_LIMIT);
      });
    } catch (err) {
      console.error(`[changelog] Error updating release cache: ${describeGithubError(err)}`);
      releases = this.releases.peek() ?? [];
    }
    return filterReleaseChoices(releases, query);
  }

  async getChangelogMessage(base: string, head: string): Promise<string> {
    return this.comparisons.getOrFetch(`${base}...${head}`, async () => {
      const { owner, repo } = this.repository;
      const comparison = await this.github.compareCommits(owner, repo, base, head);
      return formatChangelogMessage(base, head, comparison);
    });
  }
}

export const createChangelogCommandHandler = (changelog: ChangelogService): CommandHandler => {
  return async (event, responder) => {
    const base = event.options.base?.trim() ?? "";
    const head = event.options.head?.trim() ?? "";
    if (!base || !head) {
      await responder.respond({
        content: "Please provide both base and head versions.",
        ephemeral: true,
      });
      return;
    }

    await responder.deferReply();

    let message: string;
    try {
      message = await changelog.getChangelogMessage(base, head);
    } catch (err) {
      console.error(`[changelog] Error getting changelog: ${describeGithubError(err)}`);
      message = `Failed to compare versions: ${base}...${head}`;
    }
    await responder.editReply(message);
  };
};

export const createChangelogAutocompleteHandler = (
  changelog: ChangelogService,
): AutocompleteHandler => {
  return async (event, responder) => {
    const choices = await changelog.getReleaseChoices(event.focused.value);
    await responder.respondChoices(choices);
  };
};
