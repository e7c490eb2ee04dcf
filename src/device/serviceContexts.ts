/**
 * Security-context labels from a `service_contexts` file:
 *
 *   # comment
 *   activity                 u:object_r:activity_service:s0
 *   *                        u:object_r:default_android_service:s0
 *
 * The wildcard entry is a policy fallback, not a label for a named service,
 * so it is ignored and unmatched names stay unresolved.
 */

import { existsSync, readFileSync } from "fs";
import { ConfigurationError } from "../core/errors.js";

export const UNKNOWN_CONTEXT = "unknown";

export interface SecurityContextLookup {
  lookupSecurityContext(serviceName: string): string | null;
}

export function parseServiceContexts(text: string): Map<string, string> {
  const contexts = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (!line) continue;

    const [name, label] = line.split(/\s+/);
    if (!name || !label || name === "*") continue;

    // first entry wins
    if (!contexts.has(name)) {
      contexts.set(name, label);
    }
  }

  return contexts;
}

export class MapSecurityContextLookup implements SecurityContextLookup {
  constructor(private readonly contexts: ReadonlyMap<string, string>) {}

  lookupSecurityContext(serviceName: string): string | null {
    return this.contexts.get(serviceName) ?? null;
  }
}

export function loadServiceContexts(filePath: string): SecurityContextLookup {
  if (!existsSync(filePath)) {
    throw new ConfigurationError(`service_contexts file not found: ${filePath}`);
  }
  return new MapSecurityContextLookup(parseServiceContexts(readFileSync(filePath, "utf-8")));
}

/**
 * Label for display; unresolved names render as an explicit marker.
 */
export function contextLabel(lookup: SecurityContextLookup, serviceName: string): string {
  const label = lookup.lookupSecurityContext(serviceName);
  return label && label.length > 0 ? label : UNKNOWN_CONTEXT;
}
