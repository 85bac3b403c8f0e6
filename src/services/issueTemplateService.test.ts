import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { AxiosAdapter } from "axios";
import {
  convertTemplateField,
  createTemplateFetcher,
  fetchTemplateFields,
  getTemplateFieldSpecs,
  parseIssueTemplate,
} from "./issueTemplateService.js";

const TEMPLATE_YAML = `
name: Bug Report
description: File a bug report
labels: [bug]
body:
  - type: markdown
    attributes:
      value: Thanks for taking the time!
  - type: input
    id: version
    attributes:
      label: App Version
      placeholder: e.g. 2.6.4
    validations:
      required: true
  - type: textarea
    id: steps
    attributes:
      label: Steps to Reproduce
  - type: checkboxes
    id: terms
    attributes:
      label: Terms
      options:
        - label: I searched existing issues
  - type: dropdown
    id: platform
    attributes:
      label: Platform
      options: [Android, iOS]
`;

describe("issue templates", () => {
  it("keeps only interactive fields with their bounds", () => {
    const fields = getTemplateFieldSpecs(parseIssueTemplate(TEMPLATE_YAML, "bug.yml"));

    assert.deepEqual(fields, [
      {
        identifier: "version",
        displayLabel: "App Version",
        placeholder: "e.g. 2.6.4",
        required: true,
        inputStyle: "short",
        minLength: 1,
        maxLength: 100,
      },
      {
        identifier: "steps",
        displayLabel: "Steps to Reproduce",
        placeholder: "",
        required: false,
        inputStyle: "paragraph",
        minLength: 1,
        maxLength: 4000,
      },
      {
        identifier: "platform",
        displayLabel: "Platform",
        placeholder: "",
        required: false,
        inputStyle: "short",
      },
    ]);
  });

  it("skips markdown and checkboxes", () => {
    assert.equal(convertTemplateField({ type: "markdown", id: undefined, attributes: null, validations: null }, 0), null);
    assert.equal(convertTemplateField({ type: "checkboxes", id: "terms", attributes: null, validations: null }, 1), null);
  });

  it("names fields without an id by position", () => {
    const field = convertTemplateField({ type: "input", id: undefined, attributes: null, validations: null }, 2);

    assert.equal(field?.identifier, "field_3");
    assert.equal(field?.displayLabel, "field_3");
  });

  it("falls back to the id when a label repeats", () => {
    const template = parseIssueTemplate(
      [
        "body:",
        "  - { type: textarea, id: expected, attributes: { label: Details } }",
        "  - { type: textarea, id: actual, attributes: { label: Details } }",
      ].join("\n"),
      "dup.yml",
    );

    assert.deepEqual(
      getTemplateFieldSpecs(template).map((field) => [field.identifier, field.displayLabel]),
      [
        ["expected", "Details"],
        ["actual", "actual"],
      ],
    );
  });

  it("rejects a repeated field id", () => {
    const template = parseIssueTemplate(
      [
        "body:",
        "  - { type: input, id: version, attributes: { label: App Version } }",
        "  - { type: input, id: version, attributes: { label: Firmware Version } }",
      ].join("\n"),
      "dup.yml",
    );

    assert.throws(() => getTemplateFieldSpecs(template), { message: 'duplicate field id "version" in issue template' });
  });

  it("rejects a body entry without a type", () => {
    assert.throws(() => parseIssueTemplate("body:\n  - id: nope\n", "bad.yml"), /Invalid bad\.yml: body\.0\.type/);
  });

  it("fetches the raw template text", async () => {
    const requested: string[] = [];
    const adapter: AxiosAdapter = async (config) => {
      requested.push(String(config.url));
      return { data: TEMPLATE_YAML, status: 200, statusText: "OK", headers: {}, config };
    };

    const fields = await fetchTemplateFields(
      createTemplateFetcher(adapter),
      "https://raw.githubusercontent.com/example-org/example-app/main/.github/ISSUE_TEMPLATE/bug.yml",
    );

    assert.deepEqual(requested, [
      "https://raw.githubusercontent.com/example-org/example-app/main/.github/ISSUE_TEMPLATE/bug.yml",
    ]);
    assert.deepEqual(fields.map((field) => field.identifier), ["version", "steps", "platform"]);
  });
});
