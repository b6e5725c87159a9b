import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { GuardianConfig } from "../../src/config.js";
import type { Signal } from "../../src/schema/signal.js";

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");
export const fixedClock = () => FIXED_NOW;

/** Case ids for the signal ids used across the suite (UUIDv5, nil namespace, "carecase:<id>"). */
export const CASE_IDS = {
  s1: "1da0e7d7-96f1-5247-9f6d-ae2b63400b17",
  s2: "0b96bbf7-5d5c-545b-8c61-78177af1a85a",
  "sig-red": "5d00dcc7-10e9-5e92-840a-8509900d9b27",
  "sec-1": "2732a946-e205-57b9-aceb-4bf07ed8a209",
  "web-yellow": "61e5b106-14e9-5fe6-9944-ab76f286ce81",
} as const;

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    id: "s1",
    system: { name: "storefront", env: "prod", version: "2.4.1" },
    kind: "web-perf",
    severity: "warn",
    tension: 0.2,
    summary: "slow LCP",
    ...overrides,
  };
}

export function tempRoot(prefix = "guardian-tests-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function testConfig(root: string, overrides: Partial<GuardianConfig> = {}): GuardianConfig {
  return {
    root,
    generatedDir: "generated",
    patchesDir: "guardian/patches",
    identity: { name: "guardian-bot", email: "guardian-bot@users.noreply.github.com" },
    remote: "origin",
    labels: ["guardian", "bot"],
    logLevel: "error",
    ...overrides,
  };
}
