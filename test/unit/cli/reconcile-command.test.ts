import { describe, test, before, after, beforeEach } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import type { OrganizationEntry } from "../../../src/config/loader.js";
import {
  runReconcile,
  selectOrganizations,
} from "../../../src/cli/reconcile-command.js";
import { runShow } from "../../../src/cli/show-command.js";
import type { InMemoryGateway } from "../../../src/provider/in-memory-gateway.js";
import { AuthenticationError } from "../../../src/shared/errors.js";
import { buildOrganization, createMockLogger, seededGateway } from "../../mocks/index.js";

const CONFIG = `
organizations:
  - githubId: acme
    settings:
      description: New co
    repositories:
      - name: site
        topics: [docs, web]
`;

const LIVE_STATE = `
acme:
  settings:
    description: Old co
  repositories:
    - name: site
      topics: [web]
`;

describe("runReconcile", () => {
  let dir: string;
  let configPath: string;
  let lines: string[];
  const print = (line: string): void => {
    lines.push(line);
  };
  const originalSummary = process.env.GITHUB_STEP_SUMMARY;

  before(() => {
    chalk.level = 0;
    delete process.env.GITHUB_STEP_SUMMARY;
    dir = mkdtempSync(join(tmpdir(), "orgsync-cli-"));
    configPath = join(dir, "orgsync.yaml");
    writeFileSync(configPath, CONFIG);
  });

  after(() => {
    if (originalSummary !== undefined) {
      process.env.GITHUB_STEP_SUMMARY = originalSummary;
    }
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    lines = [];
  });

  function acmeGateway(): InMemoryGateway {
    return seededGateway("acme", {
      settings: { description: "Old co" },
      repositories: [{ name: "site", topics: ["web"] }],
    });
  }

  test("prints the plan of every organization", async () => {
    const gateway = acmeGateway();
    const logger = createMockLogger();

    const code = await runReconcile(
      "plan",
      { config: configPath },
      { gatewayFactory: () => gateway, logger: logger.mock, print }
    );

    assert.equal(code, 0);
    assert.deepEqual(lines, [
      "",
      "Organization acme",
      '  ~ settings "acme"',
      '      ~ description: "Old co" -> "New co"',
      '  ~ repository "acme/site"',
      "      ~ topics: [web] -> [docs, web]",
      "  ",
      "  Plan: 0 to add, 2 to change, 0 unmatched (not deleted).",
    ]);
    assert.deepEqual(logger.messages, [
      "Loaded configuration for 1 organization(s)",
      "Running in PLAN mode - no changes will be made",
    ]);
    assert.equal(gateway.get("settings", { org: "acme" })[0].description, "Old co");
  });

  test("applies the plan", async () => {
    const gateway = acmeGateway();

    const code = await runReconcile(
      "apply",
      { config: configPath },
      { gatewayFactory: () => gateway, logger: createMockLogger().mock, print }
    );

    assert.equal(code, 0);
    assert.equal(lines[lines.length - 1], "  Executed plan: 0 added, 2 changed, 0 failed.");
    assert.equal(gateway.get("settings", { org: "acme" })[0].description, "New co");
  });

  test("reads live state from a snapshot file", async () => {
    const snapshotPath = join(dir, "live.yaml");
    writeFileSync(snapshotPath, LIVE_STATE);

    const code = await runReconcile(
      "plan",
      { config: configPath, liveState: snapshotPath },
      { logger: createMockLogger().mock, print }
    );

    assert.equal(code, 0);
    assert.equal(
      lines[lines.length - 1],
      "  Plan: 0 to add, 2 to change, 0 unmatched (not deleted)."
    );
  });

  test("fails on a missing configuration file", async () => {
    const missing = join(dir, "missing.yaml");

    const code = await runReconcile(
      "plan",
      { config: missing },
      { gatewayFactory: () => acmeGateway(), logger: createMockLogger().mock, print }
    );

    assert.equal(code, 1);
    assert.equal(lines.length, 1);
    assert.ok(
      lines[0].startsWith(`Invalid configuration: Cannot read config file ${missing}: `)
    );
  });

  test("fails on an unknown organization", async () => {
    const code = await runReconcile(
      "plan",
      { config: configPath, org: ["nope"] },
      { gatewayFactory: () => acmeGateway(), logger: createMockLogger().mock, print }
    );

    assert.equal(code, 1);
    assert.deepEqual(lines, [
      'Invalid configuration: organization "nope" is not in the configuration',
    ]);
  });

  test("stops on rejected credentials", async () => {
    const gateway = acmeGateway();
    gateway.injectFailure({
      operation: "fetch",
      entityType: "settings",
      error: new AuthenticationError("Bad credentials", 401),
    });

    const code = await runReconcile(
      "plan",
      { config: configPath },
      { gatewayFactory: () => gateway, logger: createMockLogger().mock, print }
    );

    assert.equal(code, 1);
    assert.deepEqual(lines, [
      "",
      "Organization acme",
      "  Bad credentials",
      "Run stopped: Bad credentials",
    ]);
  });

  test("reports applied patches when credentials are rejected mid-run", async () => {
    const gateway = acmeGateway();
    gateway.injectFailure({
      operation: "update",
      entityType: "repository",
      error: new AuthenticationError("Bad credentials", 401),
    });

    const code = await runReconcile(
      "apply",
      { config: configPath, concurrency: 1 },
      { gatewayFactory: () => gateway, logger: createMockLogger().mock, print }
    );

    assert.equal(code, 1);
    assert.deepEqual(lines.slice(-6), [
      "",
      '  ✗ repository "site" in acme: Bad credentials (HTTP 401)',
      "  Run stopped: Bad credentials",
      "  ",
      "  Executed plan: 0 added, 1 changed, 1 failed.",
      "Run stopped: Bad credentials",
    ]);
    assert.equal(gateway.get("settings", { org: "acme" })[0].description, "New co");
  });

  test("exits non-zero when a patch fails", async () => {
    const gateway = acmeGateway();
    gateway.injectFailure({
      operation: "update",
      entityType: "repository",
      error: new Error("Repository was archived so is read-only (HTTP 403)"),
    });

    const code = await runReconcile(
      "apply",
      { config: configPath },
      { gatewayFactory: () => gateway, logger: createMockLogger().mock, print }
    );

    assert.equal(code, 1);
    assert.ok(
      lines.includes(
        '  ✗ repository "site" in acme: Repository was archived so is read-only (HTTP 403)'
      )
    );
  });
});

describe("runShow", () => {
  let dir: string;
  let lines: string[];
  const print = (line: string): void => {
    lines.push(line);
  };

  before(() => {
    chalk.level = 0;
    dir = mkdtempSync(join(tmpdir(), "orgsync-show-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    lines = [];
  });

  test("prints each organization", () => {
    const path = join(dir, "orgsync.yaml");
    writeFileSync(path, CONFIG);

    assert.equal(runShow({ config: path }, { print }), 0);
    assert.deepEqual(lines, [
      "organization acme",
      "  settings",
      '    description: "New co"',
      "  repository site",
      "    topics: [docs, web]",
      "",
    ]);
  });

  test("reports organizations that fail to load", () => {
    const path = join(dir, "broken.yaml");
    writeFileSync(path, "organizations:\n  - githubId: acme\n    webhooks: [{}]\n");

    assert.equal(runShow({ config: path }, { print }), 1);
    assert.deepEqual(lines, [
      'Invalid configuration for organization acme: webhooks[0]: missing required field "url"',
      "",
    ]);
  });
});

describe("selectOrganizations", () => {
  const entries: OrganizationEntry[] = ["acme", "globex", "initech"].map((id) => ({
    githubId: id,
    load: () => buildOrganization(id),
  }));

  test("keeps every organization without a selection", () => {
    assert.equal(selectOrganizations(entries, undefined).length, 3);
  });

  test("keeps configuration order", () => {
    assert.deepEqual(
      selectOrganizations(entries, ["initech", "acme"]).map((e) => e.githubId),
      ["acme", "initech"]
    );
  });
});
