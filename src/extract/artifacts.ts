/**
 * Artifact resolution for disassembled interface classes
 * Maps a fully-qualified interface name to its .smali file inside a corpus
 * directory, and derives the Stub / Stub$Proxy companions from it.
 */

import fs from "fs";
import path from "path";
import { log } from "../utils/log.js";

export const SMALI_EXTENSION = ".smali";

/**
 * External collaborator: fully-qualified interface name → candidate paths.
 * An empty list means the interface has no disassembled form (native service).
 */
export interface ArtifactResolver {
  resolveArtifact(query: string): string[];
}

export interface CompanionArtifacts {
  base: string;
  stub: string;
  proxy: string;
}

/**
 * `.../IFoo.smali` → `.../IFoo$Stub.smali` and `.../IFoo$Stub$Proxy.smali`
 */
export function companionPaths(resolvedPath: string): CompanionArtifacts {
  const ext = path.extname(resolvedPath);
  const stem = ext ? resolvedPath.slice(0, -ext.length) : resolvedPath;
  const suffix = ext || SMALI_EXTENSION;
  return {
    base: resolvedPath,
    stub: `${stem}$Stub${suffix}`,
    proxy: `${stem}$Stub$Proxy${suffix}`,
  };
}

/**
 * `android.app.IActivityManager` → `android/app/IActivityManager.smali`
 */
export function relativePathForClass(fullyQualifiedName: string): string {
  return `${fullyQualifiedName.split(".").join("/")}${SMALI_EXTENSION}`;
}

function getAllFiles(dir: string): string[] {
  const files: string[] = [];

  if (!fs.existsSync(dir)) {
    return files;
  }

  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      files.push(...getAllFiles(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Searches a directory of disassembled framework classes. A corpus may hold
 * several roots (one per jar), so any file whose path ends with the class
 * path matches; results are sorted for a stable "first match".
 */
export class CorpusArtifactResolver implements ArtifactResolver {
  private index: string[] | null = null;

  constructor(private readonly corpusDir: string) {}

  resolveArtifact(query: string): string[] {
    const wanted = path.sep + relativePathForClass(query).split("/").join(path.sep);
    const matches = this.files().filter((f) => f.endsWith(wanted));
    log.debug(`Resolved ${query} to ${matches.length} artifact(s)`);
    return matches;
  }

  private files(): string[] {
    if (this.index === null) {
      if (!fs.existsSync(this.corpusDir)) {
        log.warn(`Disassembled corpus not found: ${this.corpusDir}`);
      }
      this.index = getAllFiles(this.corpusDir)
        .filter((f) => f.endsWith(SMALI_EXTENSION))
        .sort();
    }
    return this.index;
  }
}

/**
 * Read an artifact as text; null when absent.
 */
export function readArtifact(filePath: string): string | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return fs.readFileSync(filePath, "utf-8");
}
