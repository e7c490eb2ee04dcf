/**
 * CLI command handlers: build, diff, diff-all, dump, list.
 * Each returns an exit status; catalog handles are closed on every path.
 */

import { CatalogBuilder } from "../catalog/builder.js";
import { withCatalog, type CatalogStore } from "../catalog/store.js";
import { baselineCatalogPath, requireCatalogs, type CatalogConfig } from "../config.js";
import { ConfigurationError, LookupError, StorageError, errorMessage } from "../core/errors.js";
import {
  MapSecurityContextLookup,
  contextLabel,
  loadServiceContexts,
  type SecurityContextLookup,
} from "../device/serviceContexts.js";
import { FileServiceEnumerator, type ServiceEnumerator } from "../device/serviceList.js";
import { DiffEngine } from "../diff/engine.js";
import { formatDiffAll, formatDump, formatList, formatServiceDiff, type ListEntry } from "../diff/format.js";
import { CorpusArtifactResolver, type ArtifactResolver } from "../extract/artifacts.js";
import { log } from "../utils/log.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_STORAGE = 3;

export interface OutputOptions {
  json?: boolean;
}

export interface ViewOptions extends OutputOptions {
  /** Annotate services with security-context labels */
  contexts?: boolean;
  /** Only service names and NEW tags */
  namesOnly?: boolean;
}

export interface BuildCollaborators {
  enumerator?: ServiceEnumerator;
  resolver?: ArtifactResolver;
}

/* ------------------------------------------------------------------ */
/* Helpers                                                            */
/* ------------------------------------------------------------------ */

function print(value: unknown, options: OutputOptions, text: () => string): void {
  console.log(options.json ? JSON.stringify(value, null, 2) : text());
}

function securityContexts(config: CatalogConfig, wanted: boolean | undefined): SecurityContextLookup | null {
  if (!wanted) {
    return null;
  }
  if (!config.serviceContextsPath) {
    log.warn("No service_contexts file configured (TXCAT_SERVICE_CONTEXTS); labels will show as unknown");
    return new MapSecurityContextLookup(new Map());
  }
  return loadServiceContexts(config.serviceContextsPath);
}

/**
 * Map an error to its exit status after reporting it.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) {
    log.error(error.message);
    return EXIT_CONFIG;
  }
  if (error instanceof StorageError) {
    log.error(`Storage failure: ${error.message}`);
    return EXIT_STORAGE;
  }
  if (error instanceof LookupError) {
    log.error(error.message);
    return EXIT_FAILURE;
  }
  log.error(errorMessage(error));
  return EXIT_FAILURE;
}

function guarded(fn: () => number): number {
  try {
    return fn();
  } catch (error) {
    return exitCodeFor(error);
  }
}

function withBothCatalogs<T>(config: CatalogConfig, fn: (project: CatalogStore, baseline: CatalogStore) => T): T {
  requireCatalogs(config, { baseline: true });
  return withCatalog(config.projectCatalogPath, { readonly: true }, (project) =>
    withCatalog(baselineCatalogPath(config), { readonly: true }, (baseline) => fn(project, baseline))
  );
}

/* ------------------------------------------------------------------ */
/* build                                                              */
/* ------------------------------------------------------------------ */

export function buildCommand(
  config: CatalogConfig,
  options: OutputOptions = {},
  collaborators: BuildCollaborators = {}
): number {
  return guarded(() => {
    const enumerator = collaborators.enumerator ?? new FileServiceEnumerator(config.serviceListPath);
    const resolver = collaborators.resolver ?? new CorpusArtifactResolver(config.corpusDir);
    const services = enumerator.enumerateServices();
    log.info(`Building ${config.projectCatalogPath} from ${services.length} services`);

    const builder = new CatalogBuilder(resolver, { prologueMarker: config.prologueMarker });
    const result = withCatalog(config.projectCatalogPath, {}, (store) => builder.build(store, services));
    if (!result.ok) {
      return exitCodeFor(result.error);
    }

    const { summary } = result;
    print({ catalog: config.projectCatalogPath, ...summary }, options, () =>
      [
        `Catalog: ${config.projectCatalogPath}`,
        `Services: ${summary.services} (${summary.servicesWithProject} with interface)`,
        `Transactions: ${summary.transactions}`,
        `Unavailable: ${summary.unavailable.length > 0 ? summary.unavailable.join(", ") : "none"}`,
        `Skipped transactions: ${summary.skippedTransactions}`,
      ].join("\n")
    );
    return EXIT_OK;
  });
}

/* ------------------------------------------------------------------ */
/* diff / diff-all                                                    */
/* ------------------------------------------------------------------ */

export function diffCommand(config: CatalogConfig, serviceName: string, options: ViewOptions = {}): number {
  return guarded(() => {
    const contexts = securityContexts(config, options.contexts);
    return withBothCatalogs(config, (project, baseline) => {
      const diff = new DiffEngine(project, baseline, { securityContexts: contexts }).diffOne(serviceName);
      print(diff, options, () => formatServiceDiff(diff, { namesOnly: options.namesOnly }));
      return EXIT_OK;
    });
  });
}

export function diffAllCommand(config: CatalogConfig, options: ViewOptions = {}): number {
  return guarded(() => {
    const contexts = securityContexts(config, options.contexts);
    return withBothCatalogs(config, (project, baseline) => {
      const result = new DiffEngine(project, baseline, { securityContexts: contexts }).diffAll();
      print(result, options, () => formatDiffAll(result, { namesOnly: options.namesOnly }));
      return result.exitCode;
    });
  });
}

/* ------------------------------------------------------------------ */
/* dump                                                               */
/* ------------------------------------------------------------------ */

export function dumpCommand(config: CatalogConfig, serviceName: string, options: ViewOptions = {}): number {
  return guarded(() => {
    requireCatalogs(config, { baseline: false });
    const contexts = securityContexts(config, options.contexts);
    return withCatalog(config.projectCatalogPath, { readonly: true }, (store) => {
      const service = store.findServiceByName(serviceName);
      if (!service) {
        throw new LookupError(`Service not found in project catalog: ${serviceName}`, serviceName, "project");
      }
      const transactions = Array.from(store.listTransactionsForService(service.id, true));
      const label = contexts ? contextLabel(contexts, serviceName) : undefined;
      print({ service, securityContext: label, transactions }, options, () =>
        formatDump(service, transactions, label)
      );
      return EXIT_OK;
    });
  });
}

/* ------------------------------------------------------------------ */
/* list                                                               */
/* ------------------------------------------------------------------ */

function newServicesAgainst(project: CatalogStore, baselinePath: string): Set<string> {
  try {
    return withCatalog(baselinePath, { readonly: true }, (baseline) =>
      new DiffEngine(project, baseline).newServiceNames()
    );
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    log.debug(`No baseline for NEW tags: ${error.message}`);
    return new Set<string>();
  }
}

/**
 * Lists project services; NEW tags appear only when a baseline catalog exists.
 */
export function listCommand(config: CatalogConfig, options: ViewOptions = {}): number {
  return guarded(() => {
    requireCatalogs(config, { baseline: false });
    const contexts = securityContexts(config, options.contexts);

    return withCatalog(config.projectCatalogPath, { readonly: true }, (project) => {
      const newNames = newServicesAgainst(project, baselineCatalogPath(config));
      const entries: ListEntry[] = Array.from(project.listServices(true), (service) => ({
        service,
        isNew: newNames.has(service.name),
        securityContext: contexts ? contextLabel(contexts, service.name) : undefined,
      }));
      print(entries, options, () => formatList(entries, { namesOnly: options.namesOnly }));
      return EXIT_OK;
    });
  });
}
