import type { GuardianConfig } from "./config.js";
import { CaseStore } from "./data/caseStore.js";
import { ProposalController } from "./proposal/controller.js";
import type { RepositoryBackend } from "./vcs/backend.js";
import { GitCliBackend } from "./vcs/gitCliBackend.js";

export interface GuardianServices {
  config: GuardianConfig;
  store: CaseStore;
  backend: RepositoryBackend;
}

export function createServices(config: GuardianConfig, backend?: RepositoryBackend): GuardianServices {
  return {
    config,
    store: new CaseStore({ root: config.root, generatedDir: config.generatedDir }),
    backend: backend ?? new GitCliBackend({ root: config.root, remote: config.remote }),
  };
}

export function createProposalController(services: GuardianServices): ProposalController {
  const { config } = services;
  return new ProposalController({
    backend: services.backend,
    store: services.store,
    root: config.root,
    patchesDir: config.patchesDir,
    identity: config.identity,
    labels: config.labels,
  });
}
