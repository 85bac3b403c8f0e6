import { KeyedTtlCache, type Clock } from "../lib/cache/ttlCache.js";
import { TEMPLATE_CACHE_TTL_MS, ISSUE_SOURCE_LABEL } from "../config/github.js";
import { ISSUE_COMMANDS, isIssueCommand } from "../config/issueCommands.js";
import {
  findModalConfig,
  toRawTemplateUrl,
  type IModalConfig,
  type IModalsConfig,
} from "../config/modals.js";
import { fetchTemplateFields, type TemplateFetcher } from "./issueTemplateService.js";
import type { IFieldSpec, IIssueForm, IIssueFormProvider } from "./issueFormTypes.js";

export const labelsForCommand = (command: string): string[] => {
  if (!isIssueCommand(command)) return [ISSUE_SOURCE_LABEL];
  return [ISSUE_SOURCE_LABEL, ISSUE_COMMANDS[command].typeLabel];
};

/**
 * Resolves forms from the modal config. Templated modals pull their fields
 * from the repository's issue form, memoized per raw URL.
 */
export class TemplateIssueFormProvider implements IIssueFormProvider {
  private readonly templates: KeyedTtlCache<IFieldSpec[]>;

  constructor(
    private readonly config: IModalsConfig,
    private readonly fetchTemplate: TemplateFetcher,
    private readonly fallbackRepository: { owner: string; repo: string } | null,
    now?: Clock,
  ) {
    this.templates = new KeyedTtlCache<IFieldSpec[]>(TEMPLATE_CACHE_TTL_MS, { now });
  }

  async getForm(command: string, channelId: string): Promise<IIssueForm | null> {
    const modal = findModalConfig(this.config, command, channelId);
    if (!modal) return null;

    const target = this.resolveTarget(modal);
    if (!target) {
      throw new Error(`No repository is configured for the ${command} form.`);
    }

    return {
      command,
      title: modal.title,
      fields: await this.resolveFields(modal),
      owner: target.owner,
      repo: target.repo,
      labels: labelsForCommand(command),
    };
  }

  private resolveTarget(modal: IModalConfig): { owner: string; repo: string } | null {
    if (modal.templateUrl) {
      return { owner: modal.templateUrl.owner, repo: modal.templateUrl.repo };
    }
    return this.fallbackRepository;
  }

  private async resolveFields(modal: IModalConfig): Promise<IFieldSpec[]> {
    if (!modal.templateUrl) {
      return modal.fields;
    }

    const rawUrl = toRawTemplateUrl(modal.templateUrl);
    return this.templates.getOrFetch(rawUrl, () => fetchTemplateFields(this.fetchTemplate, rawUrl));
  }
}
