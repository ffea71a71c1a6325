import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { reconcile } from "../../../src/diff/reconcile.js";
import { repositoryDescriptor } from "../../../src/models/index.js";
import type { EntityModel } from "../../../src/models/types.js";
import { ConfigurationError } from "../../../src/shared/errors.js";

function expectedRepo(fields: Record<string, unknown>): EntityModel {
  return repositoryDescriptor.fromConfig(fields);
}

function liveRepo(fields: Record<string, unknown>): EntityModel {
  return repositoryDescriptor.fromProviderData(fields);
}

const callbacks = {
  diffFields: (e: EntityModel, c: EntityModel) =>
    repositoryDescriptor.diffFields(e, c),
};

describe("reconcile", () => {
  test("correlates by natural key", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "site", description: "New" }), expectedRepo({ name: "api" })],
      [liveRepo({ id: 1, name: "site", description: "Old" }), liveRepo({ id: 2, name: "legacy" })],
      callbacks
    );

    assert.equal(outcome.matches.length, 1);
    assert.deepEqual(outcome.matches[0].changes, {
      description: { expected: "New", current: "Old" },
    });
    assert.equal(outcome.matches[0].renamed, false);
    assert.deepEqual(outcome.additions.map((e) => e.identity), ["api"]);
    assert.deepEqual(outcome.unmatched.map((e) => e.identity), ["legacy"]);
  });

  test("unchanged matches are kept with empty changes", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "site", description: "Same" })],
      [liveRepo({ name: "site", description: "Same" })],
      callbacks
    );
    assert.equal(outcome.matches.length, 1);
    assert.deepEqual(outcome.matches[0].changes, {});
  });

  test("correlates a rename through the provider id", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "website", id: 7 })],
      [liveRepo({ id: 7, name: "site" })],
      callbacks
    );

    assert.equal(outcome.additions.length, 0);
    assert.equal(outcome.unmatched.length, 0);
    assert.equal(outcome.matches[0].renamed, true);
    assert.deepEqual(outcome.matches[0].changes, {
      name: { expected: "website", current: "site" },
    });
  });

  test("correlates a rename through an alias", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "website", aliases: ["site"] })],
      [liveRepo({ id: 7, name: "site" })],
      callbacks
    );

    assert.equal(outcome.matches.length, 1);
    assert.equal(outcome.matches[0].current.identity, "site");
    assert.equal(outcome.matches[0].renamed, true);
  });

  test("natural key wins over an alias", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "site" }), expectedRepo({ name: "website", aliases: ["www"] })],
      [liveRepo({ name: "site" }), liveRepo({ name: "www" })],
      callbacks
    );

    assert.deepEqual(
      outcome.matches.map((m) => [m.current.identity, m.expected.identity]),
      [
        ["site", "site"],
        ["www", "website"],
      ]
    );
  });

  test("empty expected collection reports every live entity", () => {
    const outcome = reconcile(
      [],
      [liveRepo({ name: "a" }), liveRepo({ name: "b" })],
      callbacks
    );
    assert.deepEqual(outcome.unmatched.map((e) => e.identity), ["a", "b"]);
    assert.equal(outcome.matches.length, 0);
  });

  test("empty current collection makes everything an addition", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "a" }), expectedRepo({ name: "b" })],
      [],
      callbacks
    );
    assert.deepEqual(outcome.additions.map((e) => e.identity), ["a", "b"]);
  });

  test("excluded expected entities are neither added nor diffed", () => {
    const outcome = reconcile(
      [expectedRepo({ name: "a", description: "x" }), expectedRepo({ name: "b" })],
      [liveRepo({ name: "a", description: "y" })],
      { ...callbacks, includeExpected: () => false }
    );
    assert.equal(outcome.matches.length, 0);
    assert.equal(outcome.additions.length, 0);
    assert.equal(outcome.unmatched.length, 0);
  });

  test("duplicate natural keys are a configuration error", () => {
    assert.throws(
      () =>
        reconcile(
          [expectedRepo({ name: "site" }), expectedRepo({ name: "site" })],
          [],
          callbacks
        ),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.issues[0] === 'duplicate repository key "site"'
    );
  });

  test("is a pure function of its inputs", () => {
    const expected = [expectedRepo({ name: "site", description: "New" })];
    const current = [liveRepo({ name: "site", description: "Old" })];
    assert.deepEqual(
      reconcile(expected, current, callbacks),
      reconcile(expected, current, callbacks)
    );
  });
});
