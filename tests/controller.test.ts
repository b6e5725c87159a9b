import { readFileSync } from "node:fs";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { CaseStore } from "../src/data/caseStore.js";
import { renderPatchProposal } from "../src/proposal/artifact.js";
import { ineligibilityReason, ProposalController } from "../src/proposal/controller.js";
import type { GitIdentity } from "../src/config.js";
import type { Signal } from "../src/schema/signal.js";
import { synthesizeCareCase } from "../src/triage/synthesizer.js";
import { FakeBackend } from "./support/fakeBackend.js";
import { CASE_IDS, fixedClock, makeSignal, tempRoot, testConfig } from "./support/fixtures.js";

const S1 = CASE_IDS.s1;
const S1_BRANCH = `guardian/${S1}`;
const S1_PATCH = `guardian/patches/${S1}.md`;
const FIRST_URL = "https://review.example.test/pulls/1";

class PushFailsFor extends FakeBackend {
  constructor(
    root: string,
    private readonly failingBranch: string,
  ) {
    super(root);
  }

  async push(branch: string): Promise<void> {
    if (branch === this.failingBranch) {
      this.calls.push(`push ${branch}`);
      throw new Error(`remote rejected ${branch}`);
    }
    await super.push(branch);
  }
}

class CommitFailsOn extends FakeBackend {
  constructor(
    root: string,
    private readonly failingBranch: string,
  ) {
    super(root);
  }

  async commit(message: string, identity: GitIdentity, paths: string[]): Promise<void> {
    if (this.currentBranch === this.failingBranch) {
      this.calls.push(`commit ${message}`);
      throw new Error("commit hook rejected");
    }
    await super.commit(message, identity, paths);
  }
}

class UnresolvableUrl extends FakeBackend {
  async findChangeRequestUrl(head: string): Promise<string | undefined> {
    this.calls.push(`findChangeRequestUrl ${head}`);
    return undefined;
  }
}

describe("ProposalController", () => {
  let root: string;
  let store: CaseStore;

  beforeEach(() => {
    root = tempRoot();
    store = new CaseStore({ root, generatedDir: "generated" });
  });

  async function ingest(...signals: Signal[]): Promise<void> {
    for (const signal of signals) {
      await store.persist(synthesizeCareCase(signal, { now: fixedClock }));
    }
  }

  function controllerFor(backend: FakeBackend): ProposalController {
    const config = testConfig(root);
    return new ProposalController({
      backend,
      store,
      root,
      patchesDir: config.patchesDir,
      identity: config.identity,
      labels: config.labels,
    });
  }

  it("does nothing when there are no care-cases", async () => {
    const backend = new FakeBackend(root);

    const report = await controllerFor(backend).run();

    expect(report).toEqual({ outcomes: [], createdAny: false, failures: 0 });
    expect(backend.calls).toEqual([]);
  });

  it("opens a labelled change request for an eligible case", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);

    const report = await controllerFor(backend).run();

    expect(report).toEqual({
      baseBranch: "main",
      createdAny: true,
      failures: 0,
      outcomes: [
        {
          caseId: S1,
          location: `generated/carecase.${S1}.json`,
          status: "created",
          branch: S1_BRANCH,
          patchPath: S1_PATCH,
          url: FIRST_URL,
          annotation: { status: "applied" },
        },
      ],
    });
    expect(backend.calls).toEqual([
      "repositoryContext",
      "defaultBranch",
      `changeRequestExists ${S1_BRANCH}`,
      `remoteBranchExists ${S1_BRANCH}`,
      `createBranch ${S1_BRANCH} main`,
      `stageFile ${S1_PATCH}`,
      `commit Guardian propose patch for ${S1} -- ${S1_PATCH}`,
      `push ${S1_BRANCH}`,
      `openChangeRequest ${S1_BRANCH}`,
      `addLabels ${FIRST_URL} guardian bot`,
      `comment ${FIRST_URL}`,
      "resetTo main",
    ]);

    const [request] = backend.changeRequests;
    expect(request?.title).toBe(`Guardian proposed patch: ${S1}`);
    expect(request?.base).toBe("main");
    expect(request?.labels).toEqual(["guardian", "bot"]);
    expect(request?.comments[0]?.split("\n")[0]).toBe("Guardian PR checklist for reviewer:");
    expect(backend.commits).toEqual([
      {
        branch: S1_BRANCH,
        message: `Guardian propose patch for ${S1}`,
        identity: { name: "guardian-bot", email: "guardian-bot@users.noreply.github.com" },
        paths: [S1_PATCH],
      },
    ]);
    expect(backend.currentBranch).toBe("main");
  });

  it("writes the rendered proposal to the patch path", async () => {
    await ingest(makeSignal());
    const stored = await store.get(S1);

    await controllerFor(new FakeBackend(root)).run();

    expect(stored).not.toBeNull();
    if (stored) {
      expect(readFileSync(join(root, "guardian", "patches", `${S1}.md`), "utf8")).toBe(
        renderPatchProposal(stored.careCase),
      );
    }
  });

  it("leaves an existing change request alone on a second run", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    const controller = controllerFor(backend);

    await controller.run();
    backend.calls.length = 0;
    const second = await controller.run();

    expect(second.outcomes).toEqual([
      { caseId: S1, location: `generated/carecase.${S1}.json`, status: "existing_change_request", branch: S1_BRANCH },
    ]);
    expect(second.createdAny).toBe(false);
    expect(backend.changeRequests).toHaveLength(1);
    expect(backend.commits).toHaveLength(1);
    expect(backend.calls).toEqual(["repositoryContext", "defaultBranch", `changeRequestExists ${S1_BRANCH}`]);
  });

  it("skips a case whose branch already exists on the remote", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    backend.remoteBranches.set(S1_BRANCH, new Map());

    const report = await controllerFor(backend).run();

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["existing_branch"]);
    expect(backend.calls).not.toContain(`createBranch ${S1_BRANCH} main`);
    expect(backend.changeRequests).toEqual([]);
  });

  it("reports no_changes when the proposal is already on the default branch", async () => {
    await ingest(makeSignal());
    const stored = await store.get(S1);
    const backend = new FakeBackend(root);
    if (stored) {
      backend.remoteBranches.get("main")?.set(S1_PATCH, renderPatchProposal(stored.careCase));
    }

    const report = await controllerFor(backend).run();

    expect(report.outcomes).toEqual([
      {
        caseId: S1,
        location: `generated/carecase.${S1}.json`,
        status: "no_changes",
        branch: S1_BRANCH,
        patchPath: S1_PATCH,
      },
    ]);
    expect(backend.commits).toEqual([]);
    expect(backend.calls.at(-1)).toBe("resetTo main");
  });

  it("never touches the repository for ineligible cases", async () => {
    await ingest(
      makeSignal({ id: "sig-red", tension: 0.9, severity: "fail" }),
      makeSignal({ id: "web-yellow", tension: 0.5 }),
      makeSignal({ id: "sec-1", kind: "security", tension: 0.1 }),
    );
    const backend = new FakeBackend(root);

    const report = await controllerFor(backend).run();

    const reasons = Object.fromEntries(
      report.outcomes.map((outcome) => [outcome.caseId, outcome.status === "ineligible" ? outcome.reason : outcome.status]),
    );
    expect(reasons).toEqual({
      [CASE_IDS["sig-red"]]: "policy gate is red",
      [CASE_IDS["web-yellow"]]: "policy gate is yellow",
      [CASE_IDS["sec-1"]]: "no reversible proposed transition",
    });
    expect(backend.calls).toEqual(["repositoryContext", "defaultBranch"]);
  });

  it("records annotation failures without failing the case", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    backend.failOn("addLabels", new Error("label 'bot' not found"));

    const report = await controllerFor(backend).run();

    expect(report.failures).toBe(0);
    const [outcome] = report.outcomes;
    expect(outcome?.status).toBe("created");
    if (outcome?.status === "created") {
      expect(outcome.annotation).toEqual({ status: "failed", errors: ["labels: label 'bot' not found"] });
    }
    expect(backend.calls).toContain(`comment ${FIRST_URL}`);
  });

  it("looks the URL up once when opening the change request printed none", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    backend.printsUrl = false;

    const report = await controllerFor(backend).run();

    const [outcome] = report.outcomes;
    expect(outcome?.status === "created" && outcome.url).toBe(FIRST_URL);
    expect(backend.calls.filter((call) => call.startsWith("findChangeRequestUrl"))).toEqual([
      `findChangeRequestUrl ${S1_BRANCH}`,
    ]);
  });

  it("skips annotation when no URL can be resolved", async () => {
    await ingest(makeSignal());
    const backend = new UnresolvableUrl(root);
    backend.printsUrl = false;

    const report = await controllerFor(backend).run();

    const [outcome] = report.outcomes;
    expect(outcome?.status === "created" && outcome.annotation).toEqual({
      status: "skipped",
      reason: `no change request URL for ${S1_BRANCH}`,
    });
    expect(backend.changeRequests[0]?.labels).toEqual([]);
  });

  it("reports a failed URL lookup in the annotation result", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    backend.printsUrl = false;
    backend.failOn("findChangeRequestUrl", new Error("rate limited"));

    const report = await controllerFor(backend).run();

    const [outcome] = report.outcomes;
    expect(outcome?.status === "created" && outcome.annotation).toEqual({
      status: "failed",
      errors: ["lookup: rate limited"],
    });
  });

  it("keeps going after a case fails and restores the default branch each time", async () => {
    await ingest(makeSignal({ id: "s1" }), makeSignal({ id: "s2" }));
    const backend = new PushFailsFor(root, `guardian/${CASE_IDS.s2}`);

    const report = await controllerFor(backend).run();

    expect(report.outcomes.map((outcome) => [outcome.caseId, outcome.status])).toEqual([
      [CASE_IDS.s2, "failed"],
      [CASE_IDS.s1, "created"],
    ]);
    expect(report.failures).toBe(1);
    expect(report.createdAny).toBe(true);
    const [failed] = report.outcomes;
    expect(failed?.status === "failed" && failed.error).toBe(`remote rejected guardian/${CASE_IDS.s2}`);
    expect(backend.calls.filter((call) => call === "resetTo main")).toHaveLength(2);
  });

  it("marks a case failed when the existence checks fail", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    backend.failOn("changeRequestExists", new Error("gh: not authenticated"));

    const report = await controllerFor(backend).run();

    expect(report.outcomes).toEqual([
      {
        caseId: S1,
        location: `generated/carecase.${S1}.json`,
        status: "failed",
        branch: S1_BRANCH,
        error: "gh: not authenticated",
      },
    ]);
    expect(backend.calls).not.toContain(`createBranch ${S1_BRANCH} main`);
  });

  it("does not carry a failed case's staged patch into the next change request", async () => {
    await ingest(makeSignal({ id: "s1" }), makeSignal({ id: "s2" }));
    const backend = new CommitFailsOn(root, `guardian/${CASE_IDS.s2}`);

    const report = await controllerFor(backend).run();

    expect(report.outcomes.map((outcome) => [outcome.caseId, outcome.status])).toEqual([
      [CASE_IDS.s2, "failed"],
      [CASE_IDS.s1, "created"],
    ]);
    expect([...(backend.remoteBranches.get(S1_BRANCH)?.keys() ?? [])]).toEqual([S1_PATCH]);
    expect(backend.commits.map((commit) => commit.paths)).toEqual([[S1_PATCH]]);
    expect(backend.stagedPaths()).toEqual([]);
  });

  it("stops after the current case when the default branch cannot be restored", async () => {
    await ingest(makeSignal({ id: "s1" }), makeSignal({ id: "s2" }));
    const backend = new FakeBackend(root);
    backend.failOn("resetTo", new Error("checkout blocked"));

    const report = await controllerFor(backend).run();

    expect(report).toEqual({
      baseBranch: "main",
      createdAny: true,
      failures: 0,
      aborted: "could not restore main: checkout blocked",
      outcomes: [
        {
          caseId: CASE_IDS.s2,
          location: `generated/carecase.${CASE_IDS.s2}.json`,
          status: "created",
          branch: `guardian/${CASE_IDS.s2}`,
          patchPath: `guardian/patches/${CASE_IDS.s2}.md`,
          url: FIRST_URL,
          annotation: { status: "applied" },
        },
      ],
    });
    expect(backend.calls).not.toContain(`createBranch ${S1_BRANCH} main`);
  });

  it("keeps the case's own failure when restoring the default branch also fails", async () => {
    await ingest(makeSignal());
    const backend = new FakeBackend(root);
    backend.failOn("push", new Error("remote hung up"));
    backend.failOn("resetTo", new Error("checkout blocked"));

    const report = await controllerFor(backend).run();

    expect(report.outcomes.map((outcome) => (outcome.status === "failed" ? outcome.error : outcome.status))).toEqual([
      "remote hung up",
    ]);
    expect(report.failures).toBe(1);
    expect(report.aborted).toBe("could not restore main: checkout blocked");
  });
});

describe("ineligibilityReason", () => {
  it("accepts a green case with a reversible transition", () => {
    expect(ineligibilityReason(synthesizeCareCase(makeSignal(), { now: fixedClock }))).toBeUndefined();
  });

  it("rejects a green case whose transition is not reversible", () => {
    const careCase = synthesizeCareCase(makeSignal(), { now: fixedClock });
    const transition = careCase.proposed_transition;
    expect(transition).toBeDefined();
    if (transition) {
      careCase.proposed_transition = { ...transition, reversibility: "irreversible" };
    }
    expect(ineligibilityReason(careCase)).toBe("no reversible proposed transition");
  });
});
