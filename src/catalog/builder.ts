/**
 * Catalog Builder
 * Reset → insert enumerated services → extract and insert transactions.
 */

import { StorageError, errorMessage } from "../core/errors.js";
import type { ArtifactResolver } from "../extract/artifacts.js";
import { TransactionExtractor, type ExtractionResult } from "../extract/extractor.js";
import { log } from "../utils/log.js";
import type { CatalogStore } from "./store.js";
import type { NewService, NewTransaction } from "./types.js";

export interface BuildSummary {
  services: number;
  servicesWithProject: number;
  unavailable: string[];
  transactions: number;
  skippedTransactions: number;
}

export type BuildResult = { ok: true; summary: BuildSummary } | { ok: false; error: StorageError };

export interface BuilderOptions {
  prologueMarker?: string;
}

export class CatalogBuilder {
  private readonly extractor: TransactionExtractor;

  constructor(resolver: ArtifactResolver, options: BuilderOptions = {}) {
    this.extractor = new TransactionExtractor(resolver, { prologueMarker: options.prologueMarker });
  }

  /**
   * Rebuild `store` from an enumeration. Extraction problems degrade to empty
   * or partial transaction lists; store failures abort with ok=false.
   */
  build(store: CatalogStore, enumeration: readonly NewService[]): BuildResult {
    const summary: BuildSummary = {
      services: 0,
      servicesWithProject: 0,
      unavailable: [],
      transactions: 0,
      skippedTransactions: 0,
    };

    try {
      store.resetSchema();
      const services = store.insertServices(enumeration);
      summary.services = services.length;

      for (const service of services) {
        if (!service.project) {
          continue;
        }
        summary.servicesWithProject += 1;

        const result = this.extractSafely(service.name, service.project);
        if (result.status === "unavailable") {
          summary.unavailable.push(service.name);
          continue;
        }

        summary.skippedTransactions += result.skipped.length;
        const rows: NewTransaction[] = result.transactions.map((tx) => ({
          number: tx.number,
          methodName: tx.methodName,
          arguments: tx.arguments,
          returns: tx.returns,
          serviceId: service.id,
        }));
        summary.transactions += store.insertTransactions(rows);
      }
    } catch (error) {
      if (error instanceof StorageError) {
        log.error(`Catalog build failed: ${error.message}`);
        return { ok: false, error };
      }
      throw error;
    }

    log.info(
      `Built catalog: ${summary.services} services, ${summary.transactions} transactions ` +
        `(${summary.unavailable.length} unavailable, ${summary.skippedTransactions} skipped)`
    );
    return { ok: true, summary };
  }

  private extractSafely(serviceName: string, project: string): ExtractionResult {
    try {
      return this.extractor.extract(serviceName, project);
    } catch (error) {
      log.warn(`Extraction failed for ${serviceName}: ${errorMessage(error)}`);
      return { status: "unavailable", reason: "read_failed", transactions: [], detail: errorMessage(error) };
    }
  }
}
