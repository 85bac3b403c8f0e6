import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { filterFaqChoices, findFaqItem, getAllFaqItems, loadFaqData } from "./faq.js";

const FAQ_YAML = `
faq:
  - name: Getting Started
    url: https://example.test/docs/start
  - name: GPS Troubleshooting
    url: https://example.test/docs/gps
software_modules:
  - name: Store and Forward
    url: https://example.test/docs/store
  - name: 2400
    url: https://example.test/docs/2400
`;

describe("FAQ config", () => {
  let workDir = "";

  before(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "faq-test-"));
  });

  after(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("loads both sections in order", async () => {
    const filePath = path.join(workDir, "faq.yaml");
    await writeFile(filePath, FAQ_YAML);

    const data = await loadFaqData(filePath);

    assert.deepEqual(getAllFaqItems(data).map((item) => item.name), [
      "Getting Started",
      "GPS Troubleshooting",
      "Store and Forward",
      "2400",
    ]);
  });

  it("accepts a file with only one section", async () => {
    const filePath = path.join(workDir, "faq-only.yaml");
    await writeFile(filePath, "faq:\n  - name: Only\n    url: https://example.test/only\n");

    const data = await loadFaqData(filePath);

    assert.deepEqual(data.software_modules, []);
    assert.equal(findFaqItem(data, "Only")?.url, "https://example.test/only");
  });

  it("rejects entries without a url", async () => {
    const filePath = path.join(workDir, "faq-bad.yaml");
    await writeFile(filePath, "faq:\n  - name: Broken\n");

    await assert.rejects(loadFaqData(filePath), /faq\.0\.url/);
  });

  it("fails for a missing file", async () => {
    await assert.rejects(loadFaqData(path.join(workDir, "absent.yaml")), /ENOENT/);
  });

  it("finds items by exact name only", async () => {
    const filePath = path.join(workDir, "faq.yaml");
    await writeFile(filePath, FAQ_YAML);
    const data = await loadFaqData(filePath);

    assert.equal(findFaqItem(data, "Store and Forward")?.url, "https://example.test/docs/store");
    assert.equal(findFaqItem(data, "store and forward"), null);
  });

  it("filters choices case-insensitively and caps them at twenty-five", () => {
    const many = {
      faq: Array.from({ length: 30 }, (_, index) => ({ name: `Topic ${index}`, url: "https://example.test" })),
      software_modules: [],
    };

    assert.equal(filterFaqChoices(many, "").length, 25);
    assert.deepEqual(filterFaqChoices(many, "topic 29"), [{ name: "Topic 29", value: "Topic 29" }]);
  });
});
