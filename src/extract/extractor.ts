/**
 * Transaction Extractor
 * Recovers the ordered transaction list of one service from its
 * disassembled Stub and Stub$Proxy classes.
 *
 * Nothing here throws for a bad artifact: an unresolvable service yields an
 * "unavailable" result, and an unmatched method is skipped with a warning.
 */

import { ExtractionError, errorMessage } from "../core/errors.js";
import { log } from "../utils/log.js";
import { companionPaths, readArtifact, type ArtifactResolver } from "./artifacts.js";
import {
  DEFAULT_PROLOGUE_MARKER,
  parseMethodSignature,
  scanFieldDeclarations,
  scanMethodBlock,
  scanParameterNames,
} from "./scanners.js";

export interface ExtractedTransaction {
  number: number;
  methodName: string;
  arguments: string;
  returns: string;
  /** Names from `.param` annotations; informational, not persisted */
  parameterNames: string[];
}

export type UnavailableReason = "unresolved" | "stub_missing" | "proxy_missing" | "read_failed";

export type ExtractionResult =
  | {
      status: "ok";
      transactions: ExtractedTransaction[];
      /** Declared identifiers whose method block was not found */
      skipped: string[];
      stubPath: string;
      proxyPath: string;
    }
  | {
      status: "unavailable";
      reason: UnavailableReason;
      transactions: [];
      detail: string;
    };

export interface ExtractorOptions {
  prologueMarker?: string;
}

export class TransactionExtractor {
  private readonly prologueMarker: string;

  constructor(
    private readonly resolver: ArtifactResolver,
    options: ExtractorOptions = {}
  ) {
    this.prologueMarker = options.prologueMarker ?? DEFAULT_PROLOGUE_MARKER;
  }

  extract(serviceName: string, project: string): ExtractionResult {
    const candidates = this.resolver.resolveArtifact(project);
    const resolved = candidates[0];
    if (!resolved) {
      log.warn(`No disassembled source for ${serviceName} (${project}); likely a native service, skipping`);
      return unavailable("unresolved", `no artifact for ${project}`);
    }
    if (candidates.length > 1) {
      log.debug(`${project} resolved to ${candidates.length} artifacts, using ${resolved}`);
    }

    const { stub, proxy } = companionPaths(resolved);

    let stubText: string | null;
    let proxyText: string | null;
    try {
      stubText = readArtifact(stub);
      proxyText = stubText === null ? null : readArtifact(proxy);
    } catch (error) {
      const failure = new ExtractionError(errorMessage(error), serviceName, stub);
      log.warn(`Failed to read artifacts for ${serviceName}: ${failure.message}`);
      return unavailable("read_failed", failure.message);
    }

    if (stubText === null) {
      log.warn(`Stub file missing for ${serviceName}: ${stub}`);
      return unavailable("stub_missing", stub);
    }
    if (proxyText === null) {
      log.warn(`Proxy file missing for ${serviceName}: ${proxy}`);
      return unavailable("proxy_missing", proxy);
    }

    const { transactions, skipped } = this.extractFromText(serviceName, stubText, proxyText);
    return { status: "ok", transactions, skipped, stubPath: stub, proxyPath: proxy };
  }

  /**
   * The parsing half of extract(), over already loaded stub and proxy text.
   */
  extractFromText(
    serviceName: string,
    stubText: string,
    proxyText: string
  ): { transactions: ExtractedTransaction[]; skipped: string[] } {
    const transactions: ExtractedTransaction[] = [];
    const skipped: string[] = [];

    for (const field of scanFieldDeclarations(stubText)) {
      const block = scanMethodBlock(proxyText, field.name, this.prologueMarker);
      if (!block) {
        log.warn(`No method block for ${serviceName}.${field.name} (TRANSACTION_${field.name}), skipping`);
        skipped.push(field.name);
        continue;
      }

      const signature = parseMethodSignature(block);
      const parameterNames = signature.arguments.length > 0 ? scanParameterNames(block) : [];

      transactions.push({
        number: field.number,
        methodName: field.name,
        arguments: signature.arguments,
        returns: signature.returns,
        parameterNames,
      });
    }

    log.debug(`Extracted ${transactions.length} transaction(s) for ${serviceName}, skipped ${skipped.length}`);
    return { transactions, skipped };
  }
}

function unavailable(reason: UnavailableReason, detail: string): ExtractionResult {
  return { status: "unavailable", reason, transactions: [], detail };
}
