export type FieldInputStyle = "short" | "paragraph";

export interface IFieldSpec {
  readonly identifier: string;
  readonly displayLabel: string;
  readonly inputStyle: FieldInputStyle;
  readonly placeholder: string;
  readonly required: boolean;
  readonly minLength?: number;
  readonly maxLength?: number;
}

export interface IIssueForm {
  command: string;
  /** Shown as the modal title and used as the issue title fallback. */
  title: string;
  fields: readonly IFieldSpec[];
  owner: string;
  repo: string;
  labels: readonly string[];
}

export interface IIssueFormProvider {
  /** Resolves `null` when no form is configured for the command in that channel. */
  getForm(command: string, channelId: string): Promise<IIssueForm | null>;
}
