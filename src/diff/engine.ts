/**
 * Diff Engine
 * Compares a project catalog against a baseline catalog, service by service.
 *
 * The comparison is driven by the project side: each project transaction is
 * matched by method name against the baseline. Transactions that exist only
 * in the baseline are not reported.
 */

import type { CatalogStore } from "../catalog/store.js";
import type { Service, Transaction } from "../catalog/types.js";
import { LookupError, StorageError, errorMessage } from "../core/errors.js";
import { contextLabel, type SecurityContextLookup } from "../device/serviceContexts.js";
import { log } from "../utils/log.js";
import type { DiffAllResult, DiffFailure, ServiceDiff, TransactionChange } from "./types.js";

export interface DiffEngineOptions {
  /** When set, every ServiceDiff carries a security-context label */
  securityContexts?: SecurityContextLookup | null;
}

/**
 * First transaction per method name, in the order given.
 */
function indexByMethodName(transactions: readonly Transaction[]): Map<string, Transaction> {
  const index = new Map<string, Transaction>();
  for (const tx of transactions) {
    if (!index.has(tx.methodName)) {
      index.set(tx.methodName, tx);
    }
  }
  return index;
}

export function sameSignature(a: Transaction, b: Transaction): boolean {
  return a.arguments === b.arguments && a.returns === b.returns;
}

/**
 * Classify each project transaction against the baseline list.
 */
export function compareTransactions(
  project: readonly Transaction[],
  baseline: readonly Transaction[]
): TransactionChange[] {
  const baselineByName = indexByMethodName(baseline);
  const changes: TransactionChange[] = [];

  for (const tx of project) {
    const prior = baselineByName.get(tx.methodName);
    if (!prior) {
      changes.push({ kind: "new", transaction: tx });
    } else if (!sameSignature(tx, prior)) {
      changes.push({ kind: "modified", transaction: tx, baseline: prior });
    }
  }

  return changes;
}

export class DiffEngine {
  private readonly contexts: SecurityContextLookup | null;

  constructor(
    private readonly project: CatalogStore,
    private readonly baseline: CatalogStore,
    options: DiffEngineOptions = {}
  ) {
    this.contexts = options.securityContexts ?? null;
  }

  /**
   * Diff one service. Throws LookupError when the project catalog does not
   * track `serviceName`; a service missing only from the baseline is "new".
   */
  diffOne(serviceName: string): ServiceDiff {
    const service = this.project.findServiceByName(serviceName);
    if (!service) {
      throw new LookupError(`Service not found in project catalog: ${serviceName}`, serviceName, "project");
    }

    const current = Array.from(this.project.listTransactionsForService(service.id, true));
    const prior = this.baseline.findServiceByName(serviceName);

    let diff: ServiceDiff;
    if (!prior) {
      log.debug(`${serviceName} absent from baseline, reporting as new`);
      diff = {
        service,
        status: "new",
        changes: current.map((transaction): TransactionChange => ({ kind: "new", transaction })),
        changed: true,
      };
    } else {
      const previous = Array.from(this.baseline.listTransactionsForService(prior.id, true));
      const changes = compareTransactions(current, previous);
      log.debug(`${serviceName}: ${current.length} project vs ${previous.length} baseline, ${changes.length} change(s)`);
      diff = { service, status: "existing", changes, changed: changes.length > 0 };
    }

    if (this.contexts) {
      diff.securityContext = contextLabel(this.contexts, serviceName);
    }
    return diff;
  }

  /**
   * Diff every project service in name order. A lookup failure for one
   * service is recorded and the loop continues; storage errors abort.
   */
  diffAll(): DiffAllResult {
    const services: Service[] = Array.from(this.project.listServices(true));
    const diffs: ServiceDiff[] = [];
    const failures: DiffFailure[] = [];

    for (const service of services) {
      try {
        diffs.push(this.diffOne(service.name));
      } catch (error) {
        if (error instanceof StorageError) {
          throw error;
        }
        log.error(`Diff failed for ${service.name}: ${errorMessage(error)}`);
        failures.push({ serviceName: service.name, error: errorMessage(error) });
      }
    }

    return { diffs, failures, exitCode: failures.length > 0 ? 1 : 0 };
  }

  /**
   * Names present in the project catalog but not in the baseline.
   */
  newServiceNames(): Set<string> {
    const baselineNames = new Set(Array.from(this.baseline.listServices(), (s) => s.name));
    const names = new Set<string>();
    for (const service of this.project.listServices(true)) {
      if (!baselineNames.has(service.name)) {
        names.add(service.name);
      }
    }
    return names;
  }
}
