import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { DiffEngine } from "../../../src/diff/diff-engine.js";
import { AuthenticationError } from "../../../src/shared/errors.js";
import {
  buildOrganization,
  createMockLogger,
  seededGateway,
} from "../../mocks/index.js";

describe("DiffEngine", () => {
  test("reports field differences of settings and repositories", async () => {
    const org = buildOrganization("acme", {
      settings: { description: "New co" },
      repositories: [{ name: "site", topics: ["docs", "web"] }],
    });
    const gateway = seededGateway("acme", {
      settings: { description: "Old co" },
      repositories: [{ name: "site", topics: ["web"] }],
    });
    const { mock } = createMockLogger();

    const diff = await new DiffEngine(gateway, { logger: mock }).compute(org);

    assert.deepEqual(diff.summary, { additions: 0, differences: 2, unmatched: 0 });
    assert.deepEqual(
      diff.nodes.map((n) => n.entityType),
      ["settings", "repository"]
    );
    assert.deepEqual(diff.nodes[0].modifications[0].changedFields, {
      description: { expected: "New co", current: "Old co" },
    });
    assert.deepEqual(diff.nodes[1].modifications[0].changedFields, {
      topics: { expected: ["docs", "web"], current: ["web"] },
    });
    assert.deepEqual(diff.warnings, []);
    assert.deepEqual(diff.fetchFailures, []);
  });

  test("reports nothing when live state matches", async () => {
    const org = buildOrganization("acme", {
      settings: { description: "Same" },
      variables: [{ name: "REGION", value: "eu" }],
    });
    const gateway = seededGateway("acme", {
      settings: { description: "Same", plan: "team" },
      variables: [{ name: "REGION", value: "eu" }],
    });

    const diff = await new DiffEngine(gateway, {
      logger: createMockLogger().mock,
    }).compute(org);

    assert.deepEqual(diff.nodes, []);
    assert.deepEqual(diff.summary, { additions: 0, differences: 0, unmatched: 0 });
  });

  test("does not descend into repositories missing on either side", async () => {
    const org = buildOrganization("acme", {
      repositories: [
        { name: "new", secrets: [{ name: "TOKEN", value: "test-secret" }] },
      ],
    });
    const gateway = seededGateway("acme", {
      repositories: [{ name: "legacy" }],
    });

    const diff = await new DiffEngine(gateway, {
      logger: createMockLogger().mock,
    }).compute(org);

    assert.deepEqual(diff.summary, { additions: 1, differences: 1, unmatched: 1 });
    assert.equal(diff.nodes.length, 1);
    assert.equal(diff.nodes[0].additions[0].expected.identity, "new");
    assert.equal(diff.nodes[0].unmatched[0].current.identity, "legacy");
    assert.deepEqual(
      gateway.calls.filter((c) => c.scope.repository !== undefined),
      []
    );
  });

  test("reconciles repository children in the scope of the expected name", async () => {
    const org = buildOrganization("acme", {
      repositories: [
        {
          name: "website",
          aliases: ["site"],
          secrets: [{ name: "TOKEN", value: "test-secret" }],
        },
      ],
    });
    const gateway = seededGateway("acme", {
      repositories: [{ id: 10, name: "site" }],
    });

    const diff = await new DiffEngine(gateway, {
      logger: createMockLogger().mock,
    }).compute(org);

    assert.equal(diff.nodes.length, 2);
    const [repository, secrets] = diff.nodes;
    assert.equal(repository.modifications[0].previousIdentity, "site");
    assert.equal(repository.modifications[0].providerId, "10");
    assert.deepEqual(secrets.scope, {
      org: "acme",
      repository: "website",
      repositoryId: "10",
    });
    assert.equal(secrets.additions[0].expected.identity, "TOKEN");
  });

  test("skips branch protection rules of archived repositories", async () => {
    const org = buildOrganization("acme", {
      repositories: [
        {
          name: "old",
          archived: true,
          branchProtectionRules: [{ pattern: "main" }],
        },
      ],
    });
    const gateway = seededGateway("acme", {
      repositories: [{ name: "old", archived: true }],
    });

    const diff = await new DiffEngine(gateway, {
      logger: createMockLogger().mock,
    }).compute(org);

    assert.deepEqual(diff.nodes, []);
    assert.equal(
      gateway.calls.some((c) => c.entityType === "branch_protection_rule"),
      false
    );
  });

  test("records a failed read and skips that collection", async () => {
    const org = buildOrganization("acme", {
      webhooks: [{ url: "https://hooks.example.com/a" }],
      variables: [{ name: "REGION", value: "eu" }],
    });
    const gateway = seededGateway("acme");
    gateway.injectFailure({
      operation: "fetch",
      entityType: "webhook",
      error: new Error("boom"),
    });
    const { mock, warnings } = createMockLogger();

    const diff = await new DiffEngine(gateway, { logger: mock }).compute(org);

    assert.deepEqual(diff.fetchFailures, [
      { scope: { org: "acme" }, entityType: "webhook", message: "boom" },
    ]);
    assert.deepEqual(diff.nodes.map((n) => n.entityType), ["variable"]);
    assert.deepEqual(warnings, ["Failed to read webhook collection of acme: boom"]);
  });

  test("treats a failed read as empty when tolerating fetch errors", async () => {
    const org = buildOrganization("acme", {
      webhooks: [{ url: "https://hooks.example.com/a" }],
    });
    const gateway = seededGateway("acme");
    gateway.injectFailure({
      operation: "fetch",
      entityType: "webhook",
      error: new Error("boom"),
    });
    const { mock, warnings } = createMockLogger();

    const diff = await new DiffEngine(gateway, {
      tolerateFetchErrors: true,
      logger: mock,
    }).compute(org);

    const expectedWarning =
      "Failed to read webhook collection of acme, assuming it is empty: boom";
    assert.deepEqual(diff.warnings, [expectedWarning]);
    assert.deepEqual(warnings, [expectedWarning]);
    assert.deepEqual(diff.fetchFailures, []);
    assert.equal(diff.summary.additions, 1);
  });

  test("a failed child read leaves other repositories alone", async () => {
    const org = buildOrganization("acme", {
      repositories: [
        { name: "a", variables: [{ name: "X", value: "1" }] },
        { name: "b", variables: [{ name: "X", value: "1" }] },
      ],
    });
    const gateway = seededGateway("acme", {
      repositories: [{ name: "a" }, { name: "b" }],
    });
    gateway.injectFailure({
      operation: "fetch",
      entityType: "variable",
      identity: "a",
      error: new Error("timeout"),
    });

    const diff = await new DiffEngine(gateway, {
      logger: createMockLogger().mock,
    }).compute(org);

    assert.equal(diff.fetchFailures.length, 1);
    assert.equal(diff.fetchFailures[0].scope.repository, "a");
    assert.equal(diff.nodes.length, 1);
    assert.equal(diff.nodes[0].scope.repository, "b");
  });

  test("rejected credentials abort the computation", async () => {
    const org = buildOrganization("acme", { settings: { description: "x" } });
    const gateway = seededGateway("acme");
    gateway.injectFailure({
      operation: "fetch",
      entityType: "settings",
      error: new AuthenticationError("Bad credentials", 401),
    });

    await assert.rejects(
      new DiffEngine(gateway, { logger: createMockLogger().mock }).compute(org),
      AuthenticationError
    );
  });

  test("restricts repositories to the filter on both sides", async () => {
    const org = buildOrganization("acme", {
      repositories: [{ name: "web-app" }, { name: "api" }],
    });
    const gateway = seededGateway("acme", {
      repositories: [{ name: "legacy" }, { name: "web-old" }],
    });

    const diff = await new DiffEngine(gateway, {
      repoFilter: "web-*",
      logger: createMockLogger().mock,
    }).compute(org);

    assert.deepEqual(
      diff.nodes[0].additions.map((a) => a.expected.identity),
      ["web-app"]
    );
    assert.deepEqual(
      diff.nodes[0].unmatched.map((u) => u.current.identity),
      ["web-old"]
    );
  });

  test("keeps renamed repositories whose previous name is outside the filter", async () => {
    const org = buildOrganization("acme", {
      repositories: [{ name: "web-site", aliases: ["old-site"] }],
    });
    const gateway = seededGateway("acme", {
      repositories: [{ id: 10, name: "old-site" }, { name: "docs" }],
    });

    const diff = await new DiffEngine(gateway, {
      repoFilter: "web-*",
      logger: createMockLogger().mock,
    }).compute(org);

    assert.equal(diff.summary.additions, 0);
    assert.equal(diff.summary.unmatched, 0);
    assert.equal(diff.nodes.length, 1);
    const [modification] = diff.nodes[0].modifications;
    assert.equal(modification.identity, "web-site");
    assert.equal(modification.previousIdentity, "old-site");
    assert.equal(modification.providerId, "10");
  });

  test("pairs settings with the organization whatever the case of its login", async () => {
    const org = buildOrganization("acme", {
      settings: { description: "New co" },
    });
    const gateway = seededGateway("acme");
    gateway.seed("settings", { org: "acme" }, [
      { login: "Acme", description: "Old co" },
    ]);

    const diff = await new DiffEngine(gateway, {
      logger: createMockLogger().mock,
    }).compute(org);

    assert.deepEqual(diff.summary, { additions: 0, differences: 1, unmatched: 0 });
    assert.equal(diff.nodes.length, 1);
    assert.deepEqual(diff.nodes[0].modifications[0].changedFields, {
      description: { expected: "New co", current: "Old co" },
    });
  });

  describe("secrets", () => {
    const org = buildOrganization("acme", {
      secrets: [
        { name: "TOKEN", value: "test-secret" },
        { name: "MANAGED", value: "***" },
      ],
    });

    test("values are not compared by default", async () => {
      const gateway = seededGateway("acme", {
        secrets: [{ name: "TOKEN" }, { name: "MANAGED" }],
      });
      const diff = await new DiffEngine(gateway, {
        logger: createMockLogger().mock,
      }).compute(org);

      assert.deepEqual(diff.nodes, []);
    });

    test("values are rewritten when secret updates are forced", async () => {
      const gateway = seededGateway("acme", {
        secrets: [{ name: "TOKEN" }, { name: "MANAGED" }],
      });
      const diff = await new DiffEngine(gateway, {
        updateSecrets: true,
        logger: createMockLogger().mock,
      }).compute(org);

      assert.equal(diff.nodes.length, 1);
      assert.deepEqual(
        diff.nodes[0].modifications.map((m) => m.identity),
        ["TOKEN"]
      );
      assert.deepEqual(diff.nodes[0].modifications[0].changedFields, {
        value: { expected: "test-secret", current: undefined },
      });
    });

    test("placeholder secrets are never created", async () => {
      const gateway = seededGateway("acme");
      const diff = await new DiffEngine(gateway, {
        logger: createMockLogger().mock,
      }).compute(org);

      assert.deepEqual(
        diff.nodes[0].additions.map((a) => a.expected.identity),
        ["TOKEN"]
      );
    });
  });
});
