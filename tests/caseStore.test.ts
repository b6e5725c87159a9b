import { mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { CaseStore } from "../src/data/caseStore.js";
import { InputValidationError } from "../src/errors.js";
import { synthesizeCareCase } from "../src/triage/synthesizer.js";
import { CASE_IDS, fixedClock, makeSignal, tempRoot } from "./support/fixtures.js";

describe("CaseStore", () => {
  let root: string;
  let store: CaseStore;

  beforeEach(() => {
    root = tempRoot();
    store = new CaseStore({ root, generatedDir: "generated" });
  });

  it("persists one record per case at a deterministic location", async () => {
    const careCase = synthesizeCareCase(makeSignal(), { now: fixedClock });

    const location = await store.persist(careCase);

    expect(location).toBe(`generated/carecase.${CASE_IDS.s1}.json`);
    expect(JSON.parse(readFileSync(join(root, "generated", `carecase.${CASE_IDS.s1}.json`), "utf8"))).toEqual(careCase);
  });

  it("overwrites the record when the same signal is ingested again", async () => {
    await store.persist(synthesizeCareCase(makeSignal({ summary: "first" }), { now: fixedClock }));
    await store.persist(synthesizeCareCase(makeSignal({ summary: "second" }), { now: fixedClock }));

    expect(readdirSync(join(root, "generated"))).toEqual([`carecase.${CASE_IDS.s1}.json`]);
    expect((await store.get(CASE_IDS.s1))?.careCase.summary).toBe("second");
  });

  it("lists records ordered by location and ignores other files", async () => {
    await store.persist(synthesizeCareCase(makeSignal({ id: "s1" }), { now: fixedClock }));
    await store.persist(synthesizeCareCase(makeSignal({ id: "s2" }), { now: fixedClock }));
    writeFileSync(join(root, "generated", "notes.txt"), "ignore me");

    const records = await store.list();

    expect(records.map((record) => record.location)).toEqual([
      `generated/carecase.${CASE_IDS.s2}.json`,
      `generated/carecase.${CASE_IDS.s1}.json`,
    ]);
  });

  it("returns an empty list when the generated directory does not exist", async () => {
    await expect(store.list()).resolves.toEqual([]);
  });

  it("returns null for unknown or malformed case ids", async () => {
    await expect(store.get(CASE_IDS.s2)).resolves.toBeNull();
    await expect(store.get("../secrets")).resolves.toBeNull();
  });

  it("rejects records that are not valid JSON", async () => {
    mkdirSync(join(root, "generated"));
    writeFileSync(join(root, "generated", `carecase.${CASE_IDS.s1}.json`), "{ nope");

    const error = await store.list().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(InputValidationError);
    if (error instanceof InputValidationError) {
      expect(error.message).toBe(`Care-Case (generated/carecase.${CASE_IDS.s1}.json) validation failed`);
      expect(error.violations[0]?.path).toBe("(root)");
      expect(error.violations[0]?.message.startsWith("Invalid JSON: ")).toBe(true);
    }
  });

  it("rejects records that break the care-case schema", async () => {
    const careCase = synthesizeCareCase(makeSignal(), { now: fixedClock });
    mkdirSync(join(root, "generated"));
    writeFileSync(
      join(root, "generated", `carecase.${CASE_IDS.s1}.json`),
      JSON.stringify({ ...careCase, policy_gate: "purple" }),
    );

    const error = await store.get(CASE_IDS.s1).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(InputValidationError);
    if (error instanceof InputValidationError) {
      expect(error.violations.map((violation) => violation.path)).toEqual(["policy_gate"]);
    }
  });
});
