import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { buildHelpText, createTapsignHandler } from "./helpService.js";
import {
  FAQ_PROMPT_MESSAGE,
  FAQ_UNAVAILABLE_MESSAGE,
  createFaqAutocompleteHandler,
  createFaqCommandHandler,
} from "./faqService.js";
import { createRepoCommandHandler } from "./repoService.js";
import type { IFaqData } from "../config/faq.js";
import type { IGithubRepository } from "./githubService.js";
import { FakeGithubClient, RecordingResponder, TEST_ACTOR } from "./testDoubles.js";

const FAQ: IFaqData = {
  faq: [
    { name: "Getting Started", url: "https://example.test/docs/start" },
    { name: "GPS Troubleshooting", url: "https://example.test/docs/gps" },
  ],
  software_modules: [{ name: "Store and Forward", url: "https://example.test/docs/store" }],
};

const command = (commandName: string, options: Record<string, string> = {}) => ({
  kind: "command" as const,
  commandName,
  options,
  actor: TEST_ACTOR,
});

describe("/tapsign", () => {
  it("lists every command", async () => {
    const responder = new RecordingResponder();

    await createTapsignHandler()(command("tapsign"), responder);

    assert.deepEqual(responder.responses, [{ content: buildHelpText() }]);
    assert.equal(
      buildHelpText(),
      "**How to get help or make a suggestion:**\n" +
        "`/bug`: To report a bug with the app.\n" +
        "`/feature`: To request a new feature.\n" +
        "`/faq`: Frequently Asked Questions.\n" +
        "`/changelog`: View changes between two versions.\n" +
        "`/repo`: Get the GitHub URL for a repository.",
    );
  });
});

describe("/faq", () => {
  it("posts the matching entry publicly", async () => {
    const responder = new RecordingResponder();

    await createFaqCommandHandler(FAQ)(command("faq", { topic: "Store and Forward" }), responder);

    assert.deepEqual(responder.responses, [
      { content: "**Store and Forward**\nhttps://example.test/docs/store" },
    ]);
  });

  it("reports unknown topics privately", async () => {
    const responder = new RecordingResponder();

    await createFaqCommandHandler(FAQ)(command("faq", { topic: "gps troubleshooting" }), responder);

    assert.deepEqual(responder.responses, [
      { content: "FAQ topic 'gps troubleshooting' not found.", ephemeral: true },
    ]);
  });

  it("asks for a topic when none was given", async () => {
    const responder = new RecordingResponder();

    await createFaqCommandHandler(FAQ)(command("faq"), responder);

    assert.deepEqual(responder.responses, [{ content: FAQ_PROMPT_MESSAGE, ephemeral: true }]);
  });

  it("explains when no FAQ file was loaded", async () => {
    const responder = new RecordingResponder();

    await createFaqCommandHandler(null)(command("faq", { topic: "Getting Started" }), responder);

    assert.deepEqual(responder.responses, [{ content: FAQ_UNAVAILABLE_MESSAGE, ephemeral: true }]);
  });

  it("suggests topics by case-insensitive substring", async () => {
    const responder = new RecordingResponder();

    await createFaqAutocompleteHandler(FAQ)(
      { kind: "autocomplete", commandName: "faq", focused: { name: "topic", value: "GPS" }, options: {}, actor: TEST_ACTOR },
      responder,
    );

    assert.deepEqual(responder.calls, [
      { type: "choices", choices: [{ name: "GPS Troubleshooting", value: "GPS Troubleshooting" }] },
    ]);
  });
});

describe("/repo", () => {
  it("defers and replies with the default repository url", async () => {
    const responder = new RecordingResponder();
    const handler = createRepoCommandHandler(new FakeGithubClient(), { owner: "example-org", repo: "example-app" });

    await handler(command("repo"), responder);

    assert.deepEqual(responder.calls, [
      { type: "defer", ephemeral: false },
      { type: "edit", content: "https://example.test/example-org/example-app" },
    ]);
  });

  it("looks up a named repository under the default owner", async () => {
    const responder = new RecordingResponder();
    const handler = createRepoCommandHandler(new FakeGithubClient(), { owner: "example-org", repo: "example-app" });

    await handler(command("repo", { name: "firmware" }), responder);

    assert.deepEqual(responder.edits, ["https://example.test/example-org/firmware"]);
  });

  it("reports repositories that cannot be found", async () => {
    const github = new FakeGithubClient();
    github.getRepository = async (): Promise<IGithubRepository> => {
      throw new Error("Not Found");
    };
    const responder = new RecordingResponder();
    const handler = createRepoCommandHandler(github, { owner: "example-org", repo: "example-app" });

    await handler(command("repo", { name: "missing" }), responder);

    assert.deepEqual(responder.edits, ["Repository `example-org/missing` not found in the organization."]);
  });
});
