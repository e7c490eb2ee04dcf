/**
 * Service enumeration from captured `service list` output:
 *
 *   Found 3 services:
 *   0	activity: [android.app.IActivityManager]
 *   1	media.audio_flinger: []
 *
 * Empty brackets mean the service manager could not name an interface
 * (typically a native service); those services get no project.
 */

import { readFileSync, existsSync } from "fs";
import { ConfigurationError } from "../core/errors.js";
import type { NewService } from "../catalog/types.js";
import { log } from "../utils/log.js";

export interface ServiceEnumerator {
  enumerateServices(): NewService[];
}

const SERVICE_LINE_RE = /^\s*\d+\s+(\S.*?):\s*\[([^\]]*)\]\s*$/;

export function parseServiceList(text: string): NewService[] {
  const services: NewService[] = [];

  for (const line of text.split(/\r?\n/)) {
    const match = SERVICE_LINE_RE.exec(line);
    if (!match?.[1]) {
      if (line.trim() && !/^Found \d+ services:?$/.test(line.trim())) {
        log.debug(`Ignoring service list line: ${line}`);
      }
      continue;
    }

    const name = match[1].trim();

    const project = (match[2] ?? "").trim();
    services.push({ name, project: project.length > 0 ? project : null });
  }

  return services;
}

export class FileServiceEnumerator implements ServiceEnumerator {
  constructor(private readonly filePath: string) {}

  enumerateServices(): NewService[] {
    if (!existsSync(this.filePath)) {
      throw new ConfigurationError(`Service list not found: ${this.filePath}`);
    }
    return parseServiceList(readFileSync(this.filePath, "utf-8"));
  }
}
