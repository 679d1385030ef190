#!/usr/bin/env node
import "reflect-metadata";

import { parseArgs } from "node:util";

import { Logger } from "@nestjs/common";
import type { INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module.js";
import type { AppConfig } from "./config.js";
import { AuditService } from "./services/audit.service.js";
import { ScannerService } from "./services/scanner.service.js";
import type { ScanSummary } from "./services/scanner.service.js";
import { APP_CONFIG } from "./tokens.js";

export type CliCommand = "init-db" | "scan-fs" | "scan-sp" | "scan-all";

export const USAGE = `Usage: lifecycle-cli [options]

Options:
  --init-db    Create the file_audit table and its indexes
  --scan-fs    Scan the file server and archive files past the retention window
  --scan-sp    Scan the document library
  --scan-all   Run both scans
`;

/** The first recognised flag wins, in the order listed in USAGE. */
export function parseCommand(argv: string[]): CliCommand | undefined {
  const { values } = parseArgs({
    args: argv,
    options: {
      "init-db": { type: "boolean" },
      "scan-fs": { type: "boolean" },
      "scan-sp": { type: "boolean" },
      "scan-all": { type: "boolean" },
    },
    strict: false,
    allowPositionals: true,
  });
  if (values["init-db"] === true) {
    return "init-db";
  }
  if (values["scan-fs"] === true) {
    return "scan-fs";
  }
  if (values["scan-sp"] === true) {
    return "scan-sp";
  }
  if (values["scan-all"] === true) {
    return "scan-all";
  }
  return undefined;
}

export function formatSummary(summary: ScanSummary): string {
  const line = `${summary.source}: ${summary.processed} processed, ${summary.candidates} candidates, `
    + `${summary.migrated} archived, ${summary.skipped} skipped, ${summary.failed} failed`;
  return summary.error ? `${line} (${summary.error})` : line;
}

export async function runCommand(command: CliCommand, app: INestApplicationContext): Promise<string[]> {
  const scanner = app.get(ScannerService);
  switch (command) {
    case "init-db":
      if (!app.get<AppConfig>(APP_CONFIG).database.url) {
        return ["No database configured (DATABASE_URL is not set); audit records are kept in memory"];
      }
      await app.get(AuditService).initialize();
      return ["Database initialized"];
    case "scan-fs":
      return [formatSummary(await scanner.scanFileServer())];
    case "scan-sp":
      return [formatSummary(await scanner.scanRemoteLibrary())];
    case "scan-all":
      return (await scanner.scanAll()).map(formatSummary);
  }
}

async function main(argv: string[]): Promise<void> {
  const command = parseCommand(argv);
  if (!command) {
    process.stdout.write(USAGE);
    return;
  }
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ["log", "warn", "error"] });
  try {
    for (const line of await runCommand(command, app)) {
      process.stdout.write(`${line}\n`);
    }
  } finally {
    await app.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2)).catch((error) => {
    new Logger("lifecycle-cli").error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
