import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import {
  validateDocument,
  validateOrganization,
} from "../../../src/config/validator.js";

describe("validateOrganization", () => {
  test("accepts a complete organization", () => {
    assert.deepEqual(
      validateOrganization({
        githubId: "acme",
        settings: { description: "Acme", defaultRepositoryPermission: "read" },
        webhooks: [
          { url: "https://hooks.example.com/a", events: ["push"], id: 7 },
        ],
        secrets: [
          {
            name: "DEPLOY_TOKEN",
            value: "test-secret",
            visibility: "selected",
            selectedRepositories: ["site"],
          },
        ],
        variables: [{ name: "REGION", value: "eu" }],
        repositories: [
          {
            name: "site",
            aliases: ["www"],
            private: false,
            description: null,
            branchProtectionRules: [
              { pattern: "main", requiredApprovingReviewCount: 2 },
            ],
            environments: [
              {
                name: "production",
                waitTimer: 30,
                deploymentBranchPolicy: "selected",
                branchPolicies: [{ name: "main" }, { name: "v*", type: "tag" }],
              },
            ],
          },
        ],
      }),
      []
    );
  });

  test("reports every problem with its path", () => {
    const issues = validateOrganization({
      githubId: "acme",
      owner: "someone",
      settings: { plan: "enterprise" },
      webhooks: [{ events: ["push"] }],
      secrets: [{ name: "GITHUB_TOKEN", value: "test-secret" }],
      variables: [{ name: "REGION", value: "eu", id: 3 }],
      repositories: [
        {
          name: "site",
          private: "yes",
          colour: "blue",
          secrets: [{ name: "TOKEN", value: "test-secret", visibility: "all" }],
          branchProtectionRules: [
            { pattern: "main", requiredApprovingReviewCount: 7 },
          ],
          environments: [
            {
              name: "production",
              waitTimer: 50000,
              branchPolicies: [{ name: "main", type: "commit" }],
            },
          ],
        },
      ],
    });

    assert.deepEqual(issues, [
      'unknown field "owner"',
      "settings.plan: field is read-only",
      'webhooks[0]: missing required field "url"',
      "secrets[0].name: secret names must not start with GITHUB_",
      'variables[0]: unknown field "id"',
      "repositories[0].private: expected boolean, got string",
      'repositories[0]: unknown field "colour"',
      "repositories[0].branchProtectionRules[0].requiredApprovingReviewCount: must be an integer between 0 and 6",
      "repositories[0].secrets[0].visibility: only valid at organization scope",
      "repositories[0].environments[0].branchPolicies[0].type: must be one of branch, tag",
      "repositories[0].environments[0].waitTimer: must be an integer between 0 and 43200",
    ]);
  });

  test("requires secret values", () => {
    assert.deepEqual(
      validateOrganization({ githubId: "acme", secrets: [{ name: "TOKEN" }] }),
      ["secrets[0].value: secrets require a value"]
    );
  });

  test("natural keys and aliases share one namespace", () => {
    assert.deepEqual(
      validateOrganization({
        githubId: "acme",
        repositories: [
          { name: "site", id: 1 },
          { name: "website", aliases: ["site"], id: 1 },
        ],
      }),
      [
        'repositories[1]: duplicate name "site"',
        'repositories[1]: duplicate id "1"',
      ]
    );
  });

  test("webhooks are keyed by url", () => {
    assert.deepEqual(
      validateOrganization({
        githubId: "acme",
        webhooks: [
          { url: "https://hooks.example.com/a" },
          { url: "https://hooks.example.com/a" },
        ],
      }),
      ['webhooks[1]: duplicate url "https://hooks.example.com/a"']
    );
  });

  test("rejects entries that are not objects", () => {
    assert.deepEqual(validateOrganization("acme"), [
      "organization entry must be an object, got string",
    ]);
    assert.deepEqual(
      validateOrganization({ githubId: "acme", repositories: ["site"] }),
      ["repositories[0]: expected an object, got string"]
    );
  });
});

describe("validateDocument", () => {
  test("accepts organizations with repository defaults", () => {
    assert.deepEqual(
      validateDocument({
        defaults: { repository: { hasWiki: false } },
        organizations: [{ githubId: "acme" }],
      }),
      []
    );
  });

  test("requires a mapping", () => {
    assert.deepEqual(validateDocument(["acme"]), [
      "configuration must be a mapping, got list",
    ]);
  });

  test("reports unknown default sections", () => {
    assert.deepEqual(
      validateDocument({
        defaults: { webhook: {}, repository: { aliases: ["x"] } },
        organizations: [],
      }),
      [
        'defaults: unknown field "webhook"',
        'defaults.repository: "aliases" cannot have a default',
      ]
    );
  });
});
