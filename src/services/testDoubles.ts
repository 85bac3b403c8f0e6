import type {
  IGithubClient,
  IGithubComparison,
  IGithubIssueResult,
  IGithubRelease,
  IGithubRepository,
} from "./githubService.js";
import type { IFieldSpec, IIssueForm, IIssueFormProvider } from "./issueFormTypes.js";
import type {
  IAutocompleteChoice,
  IInteractionActor,
  IInteractionResponder,
  IResponsePayload,
} from "./interactionTypes.js";

export const TEST_ACTOR: IInteractionActor = { userId: "200", username: "tester", channelId: "100" };

export const buildField = (identifier: string, displayLabel: string, placeholder = ""): IFieldSpec => ({
  identifier,
  displayLabel,
  inputStyle: "short",
  placeholder,
  required: true,
});

type ResponderCall =
  | { type: "respond"; payload: IResponsePayload }
  | { type: "defer"; ephemeral: boolean }
  | { type: "edit"; content: string }
  | { type: "choices"; choices: readonly IAutocompleteChoice[] };

export class RecordingResponder implements IInteractionResponder {
  readonly calls: ResponderCall[] = [];

  get responses(): IResponsePayload[] {
    return this.calls.flatMap((call) => (call.type === "respond" ? [call.payload] : []));
  }

  get edits(): string[] {
    return this.calls.flatMap((call) => (call.type === "edit" ? [call.content] : []));
  }

  async respond(payload: IResponsePayload): Promise<void> {
    this.calls.push({ type: "respond", payload });
  }

  async deferReply(options: { ephemeral?: boolean } = {}): Promise<void> {
    this.calls.push({ type: "defer", ephemeral: options.ephemeral ?? false });
  }

  async editReply(content: string): Promise<void> {
    this.calls.push({ type: "edit", content });
  }

  async respondChoices(choices: readonly IAutocompleteChoice[]): Promise<void> {
    this.calls.push({ type: "choices", choices });
  }
}

export interface ICreatedIssue {
  owner: string;
  repo: string;
  title: string;
  body: string;
  labels: readonly string[];
}

export class FakeGithubClient implements IGithubClient {
  readonly createdIssues: ICreatedIssue[] = [];
  upstreamCalls = 0;
  failCreate = false;
  nextIssueNumber = 42;

  async listReleases(): Promise<IGithubRelease[]> {
    this.upstreamCalls += 1;
    return [];
  }

  async compareCommits(): Promise<IGithubComparison> {
    this.upstreamCalls += 1;
    return { totalCommits: 0, htmlUrl: "", commits: [] };
  }

  async createIssue(
    owner: string,
    repo: string,
    title: string,
    body: string,
    labels: readonly string[],
  ): Promise<IGithubIssueResult> {
    this.upstreamCalls += 1;
    if (this.failCreate) {
      throw new Error("issue creation unavailable");
    }
    this.createdIssues.push({ owner, repo, title, body, labels });
    const number = this.nextIssueNumber;
    return { number, htmlUrl: `https://example.test/issues/${number}` };
  }

  async getRepository(owner: string, repo: string): Promise<IGithubRepository> {
    this.upstreamCalls += 1;
    return { htmlUrl: `https://example.test/${owner}/${repo}` };
  }
}

export class StaticFormProvider implements IIssueFormProvider {
  calls = 0;
  failure: Error | null = null;
  private readonly forms = new Map<string, IIssueForm>();

  add(channelId: string, form: IIssueForm): this {
    this.forms.set(`${form.command}:${channelId}`, form);
    return this;
  }

  async getForm(command: string, channelId: string): Promise<IIssueForm | null> {
    this.calls += 1;
    if (this.failure) throw this.failure;
    return this.forms.get(`${command}:${channelId}`) ?? null;
  }
}
