import test from "node:test";
import assert from "node:assert/strict";
import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { TableShapeError, UnsupportedInputError } from "../src/common/errors.js";
import { Logger } from "../src/logger.js";
import { outputFileName, run } from "../src/runner.js";
import type { RunConfig } from "../src/types.js";

function rescaled(rank: number): string {
  return String((rank * 100 - 50.5) / 34);
}

function captureLogger(lines: string[]): Logger {
  return new Logger({ sink: (line) => lines.push(line) });
}

function baseConfig(dir: string, inputName: string): RunConfig {
  return {
    inputPath: join(dir, inputName),
    outputDir: join(dir, "out"),
    outputPrefix: "factor_betas",
    delimiter: ",",
    writeStandardized: true,
    preview: 0,
    debug: false,
  };
}

test("outputFileName combines kind, prefix and date tag", () => {
  assert.equal(
    outputFileName("transformed", "factor_betas", "2025_07_07"),
    "transformed_factor_betas_2025_07_07.csv",
  );
});

test("run writes standardized and transformed files tagged from the input name", async () => {
  const dir = await mkdtemp(join(tmpdir(), "factor-rescale-run-"));
  try {
    await writeFile(
      join(dir, "betas_20250707.csv"),
      "Symbol,Company,Value,Momentum\nAAA,Alpha,1,10\nBBB,Beta,2,20\nCCC,Gamma,3,30\n",
      "utf8",
    );
    const lines: string[] = [];
    const summary = await run(baseConfig(dir, "betas_20250707.csv"), {
      logger: captureLogger(lines),
    });

    const transformedPath = join(dir, "out", "transformed_factor_betas_2025_07_07.csv");
    const standardizedPath = join(dir, "out", "standardized_factor_betas_2025_07_07.csv");
    assert.equal(summary.dateTag, "2025_07_07");
    assert.equal(summary.encoding, "utf-8");
    assert.equal(summary.transformedPath, transformedPath);
    assert.equal(summary.standardizedPath, standardizedPath);
    assert.equal(summary.quality.transformedUndefined, 0);

    assert.equal(
      await readFile(standardizedPath, "utf8"),
      "Symbol,Company,Value,Momentum\nAAA,Alpha,-1,-1\nBBB,Beta,0,0\nCCC,Gamma,1,1\n",
    );
    const low = rescaled(1 / 7);
    const mid = rescaled(4 / 7);
    const high = rescaled(6 / 7);
    assert.equal(
      await readFile(transformedPath, "utf8"),
      `Symbol,Company,Value,Momentum\nAAA,Alpha,${low},${low}\n` +
        `BBB,Beta,${mid},${mid}\nCCC,Gamma,${high},${high}\n`,
    );
    assert.ok(lines.some((line) => line.endsWith(`[INFO] Wrote ${transformedPath}\n`)));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("run honours a date tag override and skips the standardized file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "factor-rescale-flat-"));
  try {
    await writeFile(
      join(dir, "betas.csv"),
      "Symbol,Company,Flat,Value\nAAA,Alpha,3,1\nBBB,Beta,3,3\nCCC,Gamma,3,5\n",
      "utf8",
    );
    const lines: string[] = [];
    const summary = await run(
      { ...baseConfig(dir, "betas.csv"), dateTag: "2024_12_31", writeStandardized: false },
      { logger: captureLogger(lines) },
    );

    assert.equal(
      summary.transformedPath,
      join(dir, "out", "transformed_factor_betas_2024_12_31.csv"),
    );
    assert.equal(summary.standardizedPath, undefined);
    assert.deepEqual(summary.quality.degenerateColumns, ["Flat"]);
    assert.ok(lines.some((line) => line.includes("[WARN] Column 'Flat' is degenerate")));
    await assert.rejects(() =>
      access(join(dir, "out", "standardized_factor_betas_2024_12_31.csv"), fsConstants.F_OK),
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("run decodes latin-1 input and reports the fallback", async () => {
  const dir = await mkdtemp(join(tmpdir(), "factor-rescale-latin1-"));
  try {
    await writeFile(
      join(dir, "betas.csv"),
      Buffer.from("Symbol,Company,Value\nAAA,Soci\xe9t\xe9,1\nBBB,Beta,2\n", "latin1"),
    );
    const lines: string[] = [];
    const summary = await run(
      { ...baseConfig(dir, "betas.csv"), dateTag: "2025_01_02" },
      { logger: captureLogger(lines) },
    );
    assert.equal(summary.encoding, "latin1");
    assert.equal(summary.transformed.rows[0].name, "Société");
    assert.ok(lines.some((line) => line.includes("[WARN] Input is not valid UTF-8")));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("run fails on a table without factor columns and writes nothing", async () => {
  const dir = await mkdtemp(join(tmpdir(), "factor-rescale-shape-"));
  try {
    await writeFile(join(dir, "betas.csv"), "Symbol,Company\nAAA,Alpha\n", "utf8");
    await assert.rejects(
      () => run(baseConfig(dir, "betas.csv"), { logger: captureLogger([]) }),
      TableShapeError,
    );
    await assert.rejects(() => access(join(dir, "out"), fsConstants.F_OK));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("run rejects spreadsheet files before reading them", async () => {
  await assert.rejects(
    () =>
      run(baseConfig(tmpdir(), "betas.xlsx"), { logger: captureLogger([]) }),
    UnsupportedInputError,
  );
});
