import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  ModalSessionStore,
  buildContinuationFormId,
  buildContinueButtonId,
  buildFormId,
  buildSessionKey,
  parseContinueButtonId,
  parseFormId,
  type IModalSession,
} from "./modalSessionService.js";

const buildSession = (overrides: Partial<IModalSession> = {}): IModalSession => {
  return {
    sessionKey: "bug_100_200",
    command: "bug",
    channelId: "100",
    userId: "200",
    title: "Bug Report",
    orderedFields: [],
    collectedValues: new Map<string, string>(),
    labels: ["from-discord", "bug"],
    targetOwner: "example-org",
    targetRepo: "example-app",
    ...overrides,
  };
};

describe("session identifiers", () => {
  it("formats keys and ids with underscores", () => {
    const key = buildSessionKey("bug", "100", "200");

    assert.equal(key, "bug_100_200");
    assert.equal(buildFormId("bug", "100"), "modal_bug_100");
    assert.equal(buildContinuationFormId(key), "modal_continue_bug_100_200");
    assert.equal(buildContinueButtonId(key), "continue_bug_100_200");
  });

  it("recovers the session key from a continue button", () => {
    assert.equal(parseContinueButtonId("continue_feature_1_2"), "feature_1_2");
    assert.equal(parseContinueButtonId("cancel_feature_1_2"), null);
  });

  it("routes form ids by their second segment", () => {
    assert.deepEqual(parseFormId("modal_bug_100"), { kind: "command", command: "bug" });
    assert.deepEqual(parseFormId("modal_continue_bug_100_200"), {
      kind: "continuation",
      sessionKey: "bug_100_200",
    });
    assert.equal(parseFormId("modal"), null);
    assert.equal(parseFormId("modal_"), null);
  });
});

describe("ModalSessionStore", () => {
  it("returns the stored session", () => {
    const store = new ModalSessionStore();
    const session = buildSession();

    store.create(session.sessionKey, session);

    assert.strictEqual(store.get("bug_100_200"), session);
    assert.equal(store.size, 1);
  });

  it("reports a deleted session as missing", () => {
    const store = new ModalSessionStore();
    store.create("bug_100_200", buildSession());

    assert.equal(store.delete("bug_100_200"), true);
    assert.equal(store.get("bug_100_200"), null);
    assert.equal(store.delete("bug_100_200"), false);
  });

  it("overwrites an existing session for the same key", () => {
    const store = new ModalSessionStore();
    const first = buildSession({ collectedValues: new Map([["Summary", "crash on launch"]]) });
    const second = buildSession();

    store.create("bug_100_200", first);
    store.create("bug_100_200", second);

    const current = store.get("bug_100_200");
    assert.strictEqual(current, second);
    assert.equal(current?.collectedValues.size, 0);
    assert.equal(store.size, 1);
  });

  it("keeps sessions for different users apart", () => {
    const store = new ModalSessionStore();
    store.create("bug_100_200", buildSession());
    store.create("bug_100_201", buildSession({ sessionKey: "bug_100_201", userId: "201" }));

    store.delete("bug_100_200");

    assert.equal(store.get("bug_100_200"), null);
    assert.equal(store.get("bug_100_201")?.userId, "201");
  });
});
