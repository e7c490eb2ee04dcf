/**
 * Tool configuration, resolved once from env (+ .env via dotenv) and CLI
 * flags, then passed explicitly into the builder, diff engine and commands.
 */

import { existsSync } from "fs";
import { join, resolve } from "path";
import { ConfigurationError } from "./core/errors.js";
import { DEFAULT_PROLOGUE_MARKER } from "./extract/scanners.js";

export const DEFAULT_CATALOG_NAME = "service.db";

export interface CatalogConfig {
  projectDir: string;
  catalogName: string;
  /** Catalog built from the current image */
  projectCatalogPath: string;
  /** Directory holding the reference catalog (same file name) */
  baselineDir: string;
  corpusDir: string;
  serviceListPath: string;
  serviceContextsPath: string | null;
  prologueMarker: string;
}

export interface ConfigOverrides {
  projectDir?: string;
  baselineDir?: string;
  corpusDir?: string;
  serviceListPath?: string;
  serviceContextsPath?: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): CatalogConfig {
  const projectDir = resolve(overrides.projectDir ?? nonEmpty(env.TXCAT_PROJECT_DIR) ?? process.cwd());
  const catalogName = nonEmpty(env.TXCAT_CATALOG_NAME) ?? DEFAULT_CATALOG_NAME;
  const fromProject = (value: string | undefined, fallback: string): string =>
    resolve(projectDir, value ?? fallback);

  const contexts = overrides.serviceContextsPath ?? nonEmpty(env.TXCAT_SERVICE_CONTEXTS);

  return {
    projectDir,
    catalogName,
    projectCatalogPath: join(projectDir, catalogName),
    baselineDir: fromProject(overrides.baselineDir ?? nonEmpty(env.TXCAT_BASELINE_DIR), "baseline"),
    corpusDir: fromProject(overrides.corpusDir ?? nonEmpty(env.TXCAT_CORPUS_DIR), "smali"),
    serviceListPath: fromProject(overrides.serviceListPath ?? nonEmpty(env.TXCAT_SERVICE_LIST), "service_list.txt"),
    serviceContextsPath: contexts ? resolve(projectDir, contexts) : null,
    prologueMarker: nonEmpty(env.TXCAT_PROLOGUE_MARKER) ?? DEFAULT_PROLOGUE_MARKER,
  };
}

export function baselineCatalogPath(config: CatalogConfig): string {
  return join(config.baselineDir, config.catalogName);
}

/**
 * Both catalogs must exist before a diff or list can run.
 */
export function requireCatalogs(config: CatalogConfig, options: { baseline: boolean }): void {
  if (!existsSync(config.projectCatalogPath)) {
    throw new ConfigurationError(`Project catalog missing: ${config.projectCatalogPath} (run "build" first)`);
  }
  if (options.baseline && !existsSync(baselineCatalogPath(config))) {
    throw new ConfigurationError(
      `Baseline catalog not found: ${baselineCatalogPath(config)} (set --baseline or TXCAT_BASELINE_DIR)`
    );
  }
}
