import { getDefaultRepository, type IModalsConfig, type IRepositoryTarget } from "./config/modals.js";
import type { IFaqData } from "./config/faq.js";
import type { Clock } from "./lib/cache/ttlCache.js";
import {
  ChangelogService,
  createChangelogAutocompleteHandler,
  createChangelogCommandHandler,
} from "./services/changelogService.js";
import { createFaqAutocompleteHandler, createFaqCommandHandler } from "./services/faqService.js";
import type { IGithubClient } from "./services/githubService.js";
import { createTapsignHandler } from "./services/helpService.js";
import type { CommandHandler } from "./services/interactionTypes.js";
import { InteractionRouter } from "./services/interactionRouter.js";
import { TemplateIssueFormProvider } from "./services/issueFormProvider.js";
import { IssueFormService } from "./services/issueFormService.js";
import type { TemplateFetcher } from "./services/issueTemplateService.js";
import { ModalSessionStore } from "./services/modalSessionService.js";
import { createRepoCommandHandler } from "./services/repoService.js";

export const NO_REPOSITORY_MESSAGE = "No GitHub repository is configured for this bot.";

export interface IBotContextDeps {
  modals: IModalsConfig;
  faq: IFaqData | null;
  github: IGithubClient;
  fetchTemplate: TemplateFetcher;
  repositoryOverride?: Partial<IRepositoryTarget>;
  now?: Clock;
}

export interface IBotContext {
  router: InteractionRouter;
  sessions: ModalSessionStore;
  github: IGithubClient;
  defaultRepository: IRepositoryTarget | null;
}

const createNoRepositoryHandler = (): CommandHandler => {
  return async (_event, responder) => {
    await responder.respond({ content: NO_REPOSITORY_MESSAGE, ephemeral: true });
  };
};

/** Builds the object graph the Discord adapters dispatch into. */
export const createBotContext = (deps: IBotContextDeps): IBotContext => {
  const defaultRepository = getDefaultRepository(deps.modals, deps.repositoryOverride);
  const sessions = new ModalSessionStore();
  const forms = new TemplateIssueFormProvider(deps.modals, deps.fetchTemplate, defaultRepository, deps.now);
  const issueForms = new IssueFormService({ sessions, github: deps.github, forms });

  const router = new InteractionRouter(issueForms)
    .registerCommand("tapsign", createTapsignHandler())
    .registerCommand("faq", createFaqCommandHandler(deps.faq))
    .registerAutocomplete("faq", createFaqAutocompleteHandler(deps.faq))
    .registerCommand("bug", issueForms.createCommandHandler("bug"))
    .registerCommand("feature", issueForms.createCommandHandler("feature"));

  if (defaultRepository) {
    const changelog = new ChangelogService(deps.github, defaultRepository, deps.now);
    router
      .registerCommand("changelog", createChangelogCommandHandler(changelog))
      .registerAutocomplete("changelog", createChangelogAutocompleteHandler(changelog))
      .registerCommand("repo", createRepoCommandHandler(deps.github, defaultRepository));
  } else {
    console.warn("[context] No default repository found; /changelog and /repo are disabled.");
    router
      .registerCommand("changelog", createNoRepositoryHandler())
      .registerCommand("repo", createNoRepositoryHandler());
  }

  return { router, sessions, github: deps.github, defaultRepository };
};

let context: IBotContext | null = null;

export const initBotContext = (deps: IBotContextDeps): IBotContext => {
  context = createBotContext(deps);
  return context;
};

export const getBotContext = (): IBotContext => {
  if (!context) {
    throw new Error("Bot context has not been initialized.");
  }
  return context;
};
