import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { IFieldSpec } from "./issueFormTypes.js";
import type { IModalSession } from "./modalSessionService.js";
import {
  collectByLabel,
  isSessionComplete,
  mergeSubmission,
  renderIssueBody,
  resolveIssueTitle,
  truncateForDisplay,
} from "./submissionAssembler.js";

const field = (identifier: string, displayLabel: string): IFieldSpec => ({
  identifier,
  displayLabel,
  inputStyle: "short",
  placeholder: "",
  required: true,
});

const FIELDS: IFieldSpec[] = [
  field("bug_title", "Title"),
  field("version", "App Version"),
  field("steps", "Steps to Reproduce"),
];

const buildSession = (): IModalSession => ({
  sessionKey: "bug_100_200",
  command: "bug",
  channelId: "100",
  userId: "200",
  title: "Bug Report",
  orderedFields: FIELDS,
  collectedValues: new Map<string, string>(),
  labels: ["from-discord", "bug"],
  targetOwner: "example-org",
  targetRepo: "example-app",
});

describe("mergeSubmission", () => {
  it("stores values under their display labels", () => {
    const session = buildSession();

    const count = mergeSubmission(session, { version: "2.6.4", bug_title: "Crash" });

    assert.equal(count, 2);
    assert.equal(session.collectedValues.get("App Version"), "2.6.4");
    assert.equal(session.collectedValues.get("Title"), "Crash");
    assert.equal(isSessionComplete(session), false);
  });

  it("falls back to the raw identifier for unknown fields", () => {
    const session = buildSession();

    mergeSubmission(session, { stray_input: "value" });

    assert.equal(session.collectedValues.get("stray_input"), "value");
  });

  it("overwrites a label that is submitted twice", () => {
    const session = buildSession();

    mergeSubmission(session, { version: "2.6.3" });
    const count = mergeSubmission(session, { version: "2.6.4" });

    assert.equal(count, 1);
    assert.equal(session.collectedValues.get("App Version"), "2.6.4");
  });

  it("marks the session complete once every field has a value", () => {
    const session = buildSession();

    mergeSubmission(session, { bug_title: "Crash", version: "2.6.4" });
    mergeSubmission(session, { steps: "Open the app" });

    assert.equal(isSessionComplete(session), true);
  });
});

describe("renderIssueBody", () => {
  it("renders sections in field order followed by the footer", () => {
    const collected = new Map([
      ["Steps to Reproduce", "Open the app"],
      ["Title", "Crash"],
      ["App Version", "2.6.4"],
    ]);

    const body = renderIssueBody(collected, FIELDS, "tester", "200");

    assert.equal(
      body,
      "### Title\nCrash\n\n" +
        "### App Version\n2.6.4\n\n" +
        "### Steps to Reproduce\nOpen the app\n\n" +
        "\n---\nSubmitted via Discord by: tester (200)",
    );
  });

  it("appends labels without a matching field after the ordered ones", () => {
    const collected = new Map([
      ["extra", "value"],
      ["App Version", "2.6.4"],
    ]);

    const body = renderIssueBody(collected, FIELDS, "tester", "200");

    assert.equal(
      body,
      "### App Version\n2.6.4\n\n### extra\nvalue\n\n\n---\nSubmitted via Discord by: tester (200)",
    );
  });

  it("renders only the footer when nothing was collected", () => {
    assert.equal(
      renderIssueBody(new Map(), FIELDS, "tester", "200"),
      "\n---\nSubmitted via Discord by: tester (200)",
    );
  });
});

describe("truncateForDisplay", () => {
  it("cuts long text to 97 characters plus an ellipsis", () => {
    const result = truncateForDisplay("a".repeat(150));

    assert.equal(result, `${"a".repeat(97)}...`);
    assert.equal(result.length, 100);
  });

  it("leaves text of 100 characters or fewer untouched", () => {
    assert.equal(truncateForDisplay("a".repeat(100)), "a".repeat(100));
    assert.equal(truncateForDisplay(""), "");
  });

  it("is idempotent and never exceeds 100 characters", () => {
    for (const length of [0, 1, 99, 100, 101, 150, 400]) {
      const once = truncateForDisplay("x".repeat(length));
      assert.equal(truncateForDisplay(once), once);
      assert.ok(once.length <= 100);
    }
  });
});

describe("resolveIssueTitle", () => {
  it("prefers the command title field", () => {
    const collected = new Map([["Title", "  App crashes on start  "]]);

    assert.equal(resolveIssueTitle("bug", FIELDS, collected, "Bug Report"), "App crashes on start");
  });

  it("falls back when the title field is missing or blank", () => {
    assert.equal(resolveIssueTitle("bug", FIELDS, new Map([["Title", "   "]]), "Bug Report"), "Bug Report");
    assert.equal(resolveIssueTitle("feature", FIELDS, new Map(), "Feature Request"), "Feature Request");
  });
});

describe("collectByLabel", () => {
  it("maps identifiers to labels without touching a session", () => {
    const collected = collectByLabel(FIELDS, { steps: "Tap twice", other: "x" });

    assert.deepEqual([...collected.entries()], [
      ["Steps to Reproduce", "Tap twice"],
      ["other", "x"],
    ]);
  });
});
