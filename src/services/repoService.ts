import { inlineCode } from "@discordjs/builders";
import { describeGithubError } from "./githubErrors.js";
import type { IGithubClient, IGithubRepository } from "./githubService.js";
import type { CommandHandler } from "./interactionTypes.js";
import type { IRepositoryTarget } from "../config/modals.js";

/** `/repo [name]` looks the name up under the default owner. */
export const createRepoCommandHandler = (
  github: IGithubClient,
  defaultRepository: IRepositoryTarget,
): CommandHandler => {
  return async (event, responder) => {
    const { owner } = defaultRepository;
    const repo = event.options.name?.trim() || defaultRepository.repo;

    await responder.deferReply();

    let repository: IGithubRepository;
    try {
      repository = await github.getRepository(owner, repo);
    } catch (err) {
      console.error(`[repo] Error getting repository ${owner}/${repo}: ${describeGithubError(err)}`);
      await responder.editReply(`Repository ${inlineCode(`${owner}/${repo}`)} not found in the organization.`);
      return;
    }
    await responder.editReply(repository.htmlUrl);
  };
};
