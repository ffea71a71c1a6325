import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { ConfigurationError } from "../shared/errors.js";
import { asObject, isObject } from "../models/value-utils.js";
import { interpolateEnvVars } from "./env.js";
import { applyRepositoryDefaults, normalizeOrganization } from "./normalizer.js";
import type { OrganizationConfig } from "./organization-config.js";
import { validateDocument, validateOrganization } from "./validator.js";

export interface LoadOptions {
  /** Environment used for `${VAR}` interpolation. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * One organization of a configuration document. Loading is deferred so that
 * a broken organization does not stop the others.
 */
export interface OrganizationEntry {
  readonly githubId: string;
  /** Interpolates, validates and normalizes the entry. */
  load(): OrganizationConfig;
}

function loadOrganization(
  raw: unknown,
  githubId: string,
  defaults: Record<string, unknown> | undefined,
  options: LoadOptions
): OrganizationConfig {
  const missing = new Set<string>();
  const interpolated = interpolateEnvVars(raw, {
    env: options.env,
    onMissing: (name) => missing.add(name),
  });
  const defaultsInterpolated = defaults
    ? asObject(
        interpolateEnvVars(defaults, {
          env: options.env,
          onMissing: (name) => missing.add(name),
        })
      )
    : undefined;

  const issues = [...missing].map(
    (name) => `Missing required environment variable: ${name}`
  );
  const merged = applyRepositoryDefaults(
    asObject(interpolated),
    defaultsInterpolated
  );
  issues.push(...validateOrganization(merged));

  if (issues.length > 0) {
    throw new ConfigurationError(issues, `organization ${githubId}`);
  }
  return normalizeOrganization(merged);
}

/**
 * Parses a YAML configuration document into per-organization entries.
 * Structural problems of the document as a whole are thrown right away.
 */
export function parseConfig(
  content: string,
  source = "configuration",
  options: LoadOptions = {}
): OrganizationEntry[] {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Failed to parse YAML config at ${source}: ${message}`
    );
  }

  const issues = validateDocument(document);
  if (issues.length > 0) {
    throw new ConfigurationError(issues, source);
  }

  const root = asObject(document);
  const defaults = isObject(root.defaults)
    ? asObject(root.defaults.repository)
    : undefined;
  const organizations: unknown[] = Array.isArray(root.organizations)
    ? root.organizations
    : [];

  return organizations.map((raw, index) => {
    const githubId =
      isObject(raw) && typeof raw.githubId === "string"
        ? raw.githubId
        : `organizations[${index}]`;
    return {
      githubId,
      load: () => loadOrganization(raw, githubId, defaults, options),
    };
  });
}

/**
 * Reads and parses a configuration file.
 */
export function loadConfigFile(
  filePath: string,
  options: LoadOptions = {}
): OrganizationEntry[] {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${message}`);
  }
  return parseConfig(content, filePath, options);
}
