/**
 * Human-readable output for diff, dump and list
 */

import type { Service, Transaction } from "../catalog/types.js";
import type { DiffAllResult, ServiceDiff, TransactionChange } from "./types.js";

export interface FormatOptions {
  /** Restrict output to service names and their NEW tag */
  namesOnly?: boolean;
}

export interface HeaderOptions {
  securityContext?: string;
  isNew?: boolean;
}

export function formatSignature(tx: Transaction): string {
  return `${tx.number} ${tx.methodName}(${tx.arguments}) -> ${tx.returns}`;
}

export function formatServiceHeader(service: Service, options: HeaderOptions = {}): string {
  let header = `Service: ${service.name} (${service.project ?? "none"})`;
  if (options.securityContext !== undefined) {
    header += ` [${options.securityContext}]`;
  }
  if (options.isNew) {
    header += " [NEW]";
  }
  return header;
}

export function formatChange(change: TransactionChange): string[] {
  if (change.kind === "new") {
    return [`  [+] ${formatSignature(change.transaction)}`];
  }
  return [`  [~] ${formatSignature(change.transaction)}`, `      was: ${formatSignature(change.baseline)}`];
}

export function formatServiceDiff(diff: ServiceDiff, options: FormatOptions = {}): string {
  const lines: string[] = [
    formatServiceHeader(diff.service, { securityContext: diff.securityContext, isNew: diff.status === "new" }),
  ];

  if (options.namesOnly) {
    return lines.join("\n");
  }

  if (diff.changes.length === 0) {
    lines.push(diff.status === "new" ? "  (no transactions)" : "  No changes detected.");
    return lines.join("\n");
  }

  for (const change of diff.changes) {
    lines.push(...formatChange(change));
  }
  return lines.join("\n");
}

/**
 * Only services with changes are printed; failures are listed last.
 */
export function formatDiffAll(result: DiffAllResult, options: FormatOptions = {}): string {
  const blocks = result.diffs.filter((d) => d.changed).map((d) => formatServiceDiff(d, options));

  const newCount = result.diffs.filter((d) => d.status === "new").length;
  const modifiedCount = result.diffs.filter((d) => d.status === "existing" && d.changed).length;
  const footer = [`${result.diffs.length} services compared: ${newCount} new, ${modifiedCount} changed`];
  for (const failure of result.failures) {
    footer.push(`FAILED ${failure.serviceName}: ${failure.error}`);
  }

  const sections = options.namesOnly ? [blocks.join("\n")] : blocks;
  return [...sections.filter((s) => s.length > 0), footer.join("\n")].join("\n\n");
}

export function formatDump(service: Service, transactions: readonly Transaction[], securityContext?: string): string {
  const lines = [formatServiceHeader(service, { securityContext })];
  if (transactions.length === 0) {
    lines.push("  (no transactions)");
  }
  for (const tx of transactions) {
    lines.push(`  ${formatSignature(tx)}`);
  }
  return lines.join("\n");
}

export interface ListEntry {
  service: Service;
  isNew: boolean;
  securityContext?: string;
}

export function formatListEntry(entry: ListEntry, options: FormatOptions = {}): string {
  let line = entry.service.name;
  if (!options.namesOnly) {
    line += `  ${entry.service.project ?? "-"}`;
    if (entry.securityContext !== undefined) {
      line += `  [${entry.securityContext}]`;
    }
  }
  if (entry.isNew) {
    line += " [NEW]";
  }
  return line;
}

export function formatList(entries: readonly ListEntry[], options: FormatOptions = {}): string {
  return entries.map((e) => formatListEntry(e, options)).join("\n");
}
