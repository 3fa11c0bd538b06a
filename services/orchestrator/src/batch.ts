#!/usr/bin/env node
import "reflect-metadata";

import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module.js";
import { InspectionService } from "./services/inspection.service.js";

export function parseUrlList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function runBatch(listPath: string, write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)) {
  const logger = new Logger("BatchCli");
  const urls = parseUrlList(await readFile(listPath, "utf-8"));
  if (urls.length === 0) {
    throw new Error(`no URLs found in ${listPath}`);
  }

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ["error", "warn", "log"] });
  const controller = new AbortController();
  const cancel = () => {
    logger.warn("cancel requested; waiting for running inspections to finish");
    controller.abort();
  };
  process.once("SIGINT", cancel);

  try {
    const service = app.get(InspectionService);
    const result = await service.inspectUrls(urls, controller.signal);
    for (const item of result.items) {
      write(JSON.stringify(item.decision ?? { imageRef: item.imageRef, status: item.status }));
    }
    logger.log(`${result.completed}/${result.total} images inspected`);
    return result;
  } finally {
    process.off("SIGINT", cancel);
    await app.close();
  }
}

const invokedPath = process.argv[1];

// argv[1] may be the npm bin symlink.
if (invokedPath && import.meta.url === pathToFileURL(realpathSync(invokedPath)).href) {
  const listPath = process.argv[2];
  if (!listPath) {
    // eslint-disable-next-line no-console
    console.error("usage: border-inspector-batch <url-list-file>");
    process.exitCode = 2;
  } else {
    runBatch(listPath).catch((error) => {
      // eslint-disable-next-line no-console
      console.error("Batch inspection failed", error);
      process.exitCode = 1;
    });
  }
}
