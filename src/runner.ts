import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { performance } from "node:perf_hooks";
import { extractDateTag } from "./io/dateTag.js";
import {
  assertSupportedInput,
  decodeTableText,
  formatDelimitedTable,
  parseDelimitedTable,
} from "./io/delimited.js";
import { Logger } from "./logger.js";
import { transformTable } from "./transform/pipeline.js";
import type { RunConfig, RunSummary } from "./types.js";

export interface RunOptions {
  logger?: Logger;
  now?: Date;
}

export function outputFileName(
  kind: "transformed" | "standardized",
  prefix: string,
  dateTag: string,
): string {
  return `${kind}_${prefix}_${dateTag}.csv`;
}

export async function run(config: RunConfig, options: RunOptions = {}): Promise<RunSummary> {
  const logger = options.logger ?? new Logger({ debugEnabled: config.debug });
  assertSupportedInput(config.inputPath);

  const { text, encoding } = decodeTableText(await readFile(config.inputPath));
  if (encoding !== "utf-8") {
    logger.warn(`Input is not valid UTF-8; decoded as ${encoding}. Verify names are correct.`);
  }
  const table = parseDelimitedTable(text, config.delimiter);
  logger.info(
    `Loaded ${config.inputPath}: rows=${table.rows.length} columns=${table.header.length}`,
  );

  const started = performance.now();
  const result = transformTable(table);
  logger.debug(
    `Transform finished in ${(performance.now() - started).toFixed(1)}ms, ` +
      `pooled=${result.quality.pooledSize}`,
  );

  for (const column of result.quality.degenerateColumns) {
    logger.warn(`Column '${column}' is degenerate (fewer than 2 values or no spread); left blank.`);
  }
  for (const blank of result.quality.transformedBlanks) {
    logger.debug(`Blank transformed cells in '${blank.column}': rows ${blank.rows.join(", ")}`);
  }

  const dateTag = config.dateTag ?? extractDateTag(basename(config.inputPath), options.now);
  await mkdir(config.outputDir, { recursive: true });

  const transformedPath = join(
    config.outputDir,
    outputFileName("transformed", config.outputPrefix, dateTag),
  );
  await writeFile(
    transformedPath,
    formatDelimitedTable(result.transformed, config.delimiter),
    "utf8",
  );
  logger.info(`Wrote ${transformedPath}`);

  let standardizedPath: string | undefined;
  if (config.writeStandardized) {
    standardizedPath = join(
      config.outputDir,
      outputFileName("standardized", config.outputPrefix, dateTag),
    );
    await writeFile(
      standardizedPath,
      formatDelimitedTable(result.standardized, config.delimiter),
      "utf8",
    );
    logger.info(`Wrote ${standardizedPath}`);
  }

  return {
    inputPath: config.inputPath,
    encoding,
    dateTag,
    transformedPath,
    standardizedPath,
    quality: result.quality,
    transformed: result.transformed,
  };
}
