import { describe, test, before } from "node:test";
import { strict as assert } from "node:assert";
import chalk from "chalk";
import type { ApplyResult } from "../../../src/apply/types.js";
import {
  formatApplyResult,
  formatApplySummary,
} from "../../../src/output/apply-report.js";
import type { LivePatch } from "../../../src/plan/types.js";
import { AuthenticationError } from "../../../src/shared/errors.js";

const RENAME: LivePatch = {
  id: "update:repository:acme:site",
  entityType: "repository",
  operation: "update",
  origin: "modification",
  scope: { org: "acme" },
  identity: "site",
  payload: { description: "Docs" },
  changedFields: ["description"],
  lane: "repo:site",
};

const SECRET: LivePatch = {
  id: "create:secret:acme/site:TOKEN",
  entityType: "secret",
  operation: "create",
  origin: "addition",
  scope: { org: "acme", repository: "site" },
  identity: "TOKEN",
  payload: { name: "TOKEN", value: "test-secret" },
  changedFields: [],
  dependsOn: RENAME.id,
  lane: "repo:site",
};

const VARIABLE: LivePatch = {
  id: "update:variable:acme:REGION",
  entityType: "variable",
  operation: "update",
  origin: "modification",
  scope: { org: "acme" },
  identity: "REGION",
  payload: { value: "eu" },
  changedFields: ["value"],
  lane: "org",
};

function result(overrides: Partial<ApplyResult> = {}): ApplyResult {
  return {
    additions: 0,
    differences: 0,
    deletions: 0,
    failures: [],
    applied: [],
    notDispatched: [],
    ...overrides,
  };
}

describe("formatApplySummary", () => {
  test("omits deletions when there are none", () => {
    assert.equal(
      formatApplySummary(result({ additions: 1, differences: 2 })),
      "Executed plan: 1 added, 2 changed, 0 failed."
    );
  });

  test("includes deletions of a pruning run", () => {
    assert.equal(
      formatApplySummary(result({ deletions: 3 })),
      "Executed plan: 0 added, 0 changed, 3 deleted, 0 failed."
    );
  });
});

describe("formatApplyResult", () => {
  before(() => {
    chalk.level = 0;
  });

  test("a clean run is only the summary", () => {
    assert.deepEqual(formatApplyResult(result({ differences: 2 })), [
      "Executed plan: 0 added, 2 changed, 0 failed.",
    ]);
  });

  test("lists failures, skipped patches and the reason the run stopped", () => {
    const lines = formatApplyResult(
      result({
        additions: 1,
        differences: 2,
        failures: [
          {
            patch: RENAME,
            reason: "provider-error",
            message: "Resource not accessible",
            status: 403,
          },
          { patch: SECRET, reason: "parent-failed", message: "parent rename failed" },
        ],
        notDispatched: [VARIABLE],
        fatalError: new AuthenticationError("Bad credentials", 401),
      })
    );

    assert.deepEqual(lines, [
      '✗ repository "site" in acme: Resource not accessible (HTTP 403)',
      '⊘ create secret "acme/site/TOKEN": skipped, parent rename failed',
      "1 patch(es) were not dispatched:",
      '    update variable "acme/REGION"',
      "Run stopped: Bad credentials",
      "",
      "Executed plan: 1 added, 2 changed, 2 failed.",
    ]);
  });
});
