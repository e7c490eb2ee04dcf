/**
 * Diff output types
 */

import type { Service, Transaction } from "../catalog/types.js";

export type ServiceStatus = "new" | "existing";

export type TransactionChange =
  | { kind: "new"; transaction: Transaction }
  | {
      kind: "modified";
      transaction: Transaction;
      /** First baseline transaction with the same method name */
      baseline: Transaction;
    };

export interface ServiceDiff {
  service: Service;
  status: ServiceStatus;
  /** Security-context label, "unknown" when unresolved; undefined when not requested */
  securityContext?: string;
  /** In ascending transaction number; unchanged transactions are omitted */
  changes: TransactionChange[];
  /** True for new services and for existing ones with any change */
  changed: boolean;
}

export interface DiffFailure {
  serviceName: string;
  error: string;
}

export interface DiffAllResult {
  diffs: ServiceDiff[];
  failures: DiffFailure[];
  exitCode: number;
}
