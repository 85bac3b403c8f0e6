import { ISSUE_COMMANDS, isIssueCommand } from "../config/issueCommands.js";
import { chunkFields, MAX_FIELDS_PER_PAGE } from "./fieldChunker.js";
import { describeGithubError } from "./githubErrors.js";
import type { IGithubClient, IGithubIssueResult } from "./githubService.js";
import type { IFieldSpec, IIssueForm, IIssueFormProvider } from "./issueFormTypes.js";
import type {
  CommandHandler,
  IInteractionActor,
  IInteractionResponder,
} from "./interactionTypes.js";
import {
  buildContinuationFormId,
  buildContinueButtonId,
  buildFormId,
  buildSessionKey,
  type FormIdRoute,
  type IModalSession,
  type ModalSessionStore,
} from "./modalSessionService.js";
import {
  collectByLabel,
  isSessionComplete,
  mergeSubmission,
  renderIssueBody,
  resolveIssueTitle,
  truncateForDisplay,
} from "./submissionAssembler.js";

export const SESSION_EXPIRED_MESSAGE = "❌ Session expired. Please start over.";
export const ISSUE_FAILED_MESSAGE = "❌ Failed to create issue. Please try again later.";
export const TEMPLATE_FAILED_MESSAGE = "Unable to load the issue form right now. Please try again later.";
const MARKDOWN_NOTE =
  "**Note:** You can use Markdown formatting in your descriptions. " +
  "To add images or other attachments, please edit the issue directly on GitHub.";

export const buildNotConfiguredMessage = (command: string): string => {
  const displayName = isIssueCommand(command) ? ISSUE_COMMANDS[command].displayName : command;
  return `Sorry, the ${displayName} command is not configured for this channel.`;
};

export const buildProgressMessage = (currentPage: number, totalPages: number): string => {
  return `Part ${currentPage} of ${totalPages} complete. Click 'Continue' to proceed.`;
};

const buildSuccessMessage = (issueNumber: number, htmlUrl: string, withNote: boolean): string => {
  const message = `✅ Issue #${issueNumber} created successfully!\n${htmlUrl}`;
  return withNote ? `${message}\n\n${MARKDOWN_NOTE}` : message;
};

const toDisplayFields = (fields: readonly IFieldSpec[]): IFieldSpec[] => {
  return fields.map((field) => ({ ...field, placeholder: truncateForDisplay(field.placeholder) }));
};

export interface IIssueFormServiceDeps {
  sessions: ModalSessionStore;
  github: IGithubClient;
  forms: IIssueFormProvider;
}

/**
 * Drives `/bug` and `/feature`: shows the first page of the form, tracks
 * multi-page submissions and files the issue once every field has a value.
 */
export class IssueFormService {
  private readonly sessions: ModalSessionStore;
  private readonly github: IGithubClient;
  private readonly forms: IIssueFormProvider;

  constructor(deps: IIssueFormServiceDeps) {
    this.sessions = deps.sessions;
    this.github = deps.github;
    this.forms = deps.forms;
  }

  createCommandHandler(command: string): CommandHandler {
    return (event, responder) => this.startForm(command, event.actor, responder);
  }

  async startForm(
    command: string,
    actor: IInteractionActor,
    responder: IInteractionResponder,
  ): Promise<void> {
    let form: IIssueForm | null;
    try {
      form = await this.forms.getForm(command, actor.channelId);
    } catch (err) {
      console.error(`[issues] Failed to load the ${command} form for channel ${actor.channelId}:`, err);
      await responder.respond({ content: TEMPLATE_FAILED_MESSAGE, ephemeral: true });
      return;
    }

    if (!form) {
      await responder.respond({ content: buildNotConfiguredMessage(command), ephemeral: true });
      return;
    }

    const sessionKey = buildSessionKey(command, actor.channelId, actor.userId);
    if (form.fields.length > MAX_FIELDS_PER_PAGE) {
      this.sessions.create(sessionKey, {
        sessionKey,
        command,
        channelId: actor.channelId,
        userId: actor.userId,
        title: form.title,
        orderedFields: form.fields,
        collectedValues: new Map<string, string>(),
        labels: form.labels,
        targetOwner: form.owner,
        targetRepo: form.repo,
      });
    } else {
      this.sessions.delete(sessionKey);
    }

    const page = chunkFields(form.fields, 0);
    await responder.respond({
      form: {
        customId: buildFormId(command, actor.channelId),
        title: form.title,
        fields: toDisplayFields(page.remaining),
      },
    });
  }

  async submitForm(
    route: FormIdRoute,
    values: Record<string, string>,
    actor: IInteractionActor,
    responder: IInteractionResponder,
  ): Promise<void> {
    if (route.kind === "continuation") {
      const session = this.sessions.get(route.sessionKey);
      if (!session) {
        console.warn(`[issues] Modal session not found for key: ${route.sessionKey}`);
        await responder.respond({ content: SESSION_EXPIRED_MESSAGE, ephemeral: true });
        return;
      }
      await this.mergePage(session, values, actor, responder);
      return;
    }

    const sessionKey = buildSessionKey(route.command, actor.channelId, actor.userId);
    const session = this.sessions.get(sessionKey);
    if (session) {
      await this.mergePage(session, values, actor, responder);
      return;
    }
    await this.submitSinglePage(route.command, values, actor, responder);
  }

  async showNextPage(sessionKey: string, responder: IInteractionResponder): Promise<void> {
    const session = this.sessions.get(sessionKey);
    if (!session) {
      console.warn(`[issues] Modal session not found for key: ${sessionKey}`);
      await responder.respond({ content: SESSION_EXPIRED_MESSAGE, ephemeral: true });
      return;
    }

    const page = chunkFields(session.orderedFields, session.collectedValues.size);
    if (page.isComplete) {
      // The final page is already being filed.
      await responder.respond({ content: SESSION_EXPIRED_MESSAGE, ephemeral: true });
      return;
    }

    await responder.respond({
      form: {
        customId: buildContinuationFormId(sessionKey),
        title: session.title,
        fields: toDisplayFields(page.remaining),
      },
    });
  }

  private async mergePage(
    session: IModalSession,
    values: Record<string, string>,
    actor: IInteractionActor,
    responder: IInteractionResponder,
  ): Promise<void> {
    const collectedCount = mergeSubmission(session, values);

    if (!isSessionComplete(session)) {
      const page = chunkFields(session.orderedFields, collectedCount);
      await responder.respond({
        content: buildProgressMessage(page.currentPage, page.totalPages),
        ephemeral: true,
        button: { customId: buildContinueButtonId(session.sessionKey), label: "Continue" },
      });
      return;
    }

    await responder.deferReply({ ephemeral: true });

    const title = resolveIssueTitle(session.command, session.orderedFields, session.collectedValues, session.title);
    const body = renderIssueBody(session.collectedValues, session.orderedFields, actor.username, actor.userId);

    let issue: IGithubIssueResult;
    try {
      issue = await this.github.createIssue(
        session.targetOwner,
        session.targetRepo,
        title,
        body,
        session.labels,
      );
    } catch (err) {
      console.error(`[issues] Failed to create GitHub issue: ${describeGithubError(err)}`);
      this.sessions.delete(session.sessionKey);
      await responder.editReply(ISSUE_FAILED_MESSAGE);
      return;
    }

    this.sessions.delete(session.sessionKey);
    await responder.editReply(buildSuccessMessage(issue.number, issue.htmlUrl, true));
  }

  private async submitSinglePage(
    command: string,
    values: Record<string, string>,
    actor: IInteractionActor,
    responder: IInteractionResponder,
  ): Promise<void> {
    await responder.deferReply({ ephemeral: true });

    let form: IIssueForm | null;
    try {
      form = await this.forms.getForm(command, actor.channelId);
    } catch (err) {
      console.error(`[issues] Failed to load the ${command} form for channel ${actor.channelId}:`, err);
      await responder.editReply(ISSUE_FAILED_MESSAGE);
      return;
    }
    if (!form) {
      await responder.editReply(buildNotConfiguredMessage(command));
      return;
    }

    const collected = collectByLabel(form.fields, values);
    const title = resolveIssueTitle(command, form.fields, collected, form.title);
    const body = renderIssueBody(collected, form.fields, actor.username, actor.userId);

    let issue: IGithubIssueResult;
    try {
      issue = await this.github.createIssue(form.owner, form.repo, title, body, form.labels);
    } catch (err) {
      console.error(`[issues] Failed to create GitHub issue: ${describeGithubError(err)}`);
      await responder.editReply(ISSUE_FAILED_MESSAGE);
      return;
    }
    await responder.editReply(buildSuccessMessage(issue.number, issue.htmlUrl, false));
  }
}
