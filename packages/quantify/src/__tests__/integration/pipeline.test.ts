import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { validateConfig } from "@pequant/config";
import { silentLogger } from "@pequant/core";
import {
  InputFileNotFoundError,
  InputSchemaError,
  OutputWriteError,
  RunAbortedError,
} from "@pequant/errors";
import { fileExists } from "@pequant/io";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runQuantification } from "../../pipeline.js";

const DESIGNS = [
  "design_id\ttarget_locus\tamplicon\tintended_edit",
  "HEK3_P10_R13\tHEK3\tAMP1\tCTT ins",
  "HEK3_P13_R10\tHEK3\tAMP1\tCTT ins",
  "",
].join("\n");

const WIDE = [
  "sample\ttotal_reads\tintended_edit\tindel\tunmodified",
  "HEK3_P10_R13_rep1\t10\t5\t1\t4",
  "HEK3_P10_R13_rep2\t10\t3\t2\t5",
  "MYSTERY_A01\t6\t1\t0\t5",
  "",
].join("\n");

const AMPLICON = [
  "Batch\tAmplicon\tUnmodified\tModified\tDiscarded",
  "HEK3_P13_R10_rep1\tReference\t6\t2\t1",
  "HEK3_P13_R10_rep1\tPrime-edited\t10\t1\t0",
  "",
].join("\n");

const HEADER =
  "design_id\ttotal_reads\tintended_edit_reads\tunintended_edit_reads\tindel_reads\tunmodified_reads\tunclassified_reads\tintended_edit_fraction\tunintended_edit_fraction\tindel_fraction\tunmodified_fraction\tunclassified_fraction\tstatus";

const config = validateConfig({ output: { fractionDigits: 4 } });

describe("runQuantification", () => {
  let dir: string;
  let designPath: string;
  let quantificationPath: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pequant-run-"));
    designPath = join(dir, "designs.tsv");
    quantificationPath = join(dir, "counts.tsv");
    outputPath = join(dir, "summary.tsv");
    await writeFile(designPath, DESIGNS);
    await writeFile(quantificationPath, WIDE);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the summary table", async () => {
    const run = await runQuantification({
      designPath,
      quantificationPath,
      outputPath,
      config,
      logger: silentLogger,
    });

    expect(run.outputPath).toBe(outputPath);
    expect(await readFile(outputPath, "utf-8")).toBe(
      [
        HEADER,
        "HEK3_P10_R13\t20\t8\t0\t3\t9\t0\t0.4000\t0.0000\t0.1500\t0.4500\t0.0000\tresolved",
        "HEK3_P13_R10\t0\t0\t0\t0\t0\t0\tNA\tNA\tNA\tNA\tNA\tresolved",
        "MYSTERY_A01\t6\t1\t0\t0\t5\t0\t0.1667\t0.0000\t0.0000\t0.8333\t0.0000\tunresolved",
        "",
      ].join("\n"),
    );
    expect(run.report.countByCode()).toEqual({ RESOLVE_SAMPLE_UNRESOLVED: 1 });
  });

  it("logs a summary of record issues", async () => {
    const warnings: string[] = [];
    await runQuantification({
      designPath,
      quantificationPath,
      outputPath,
      config,
      logger: { info: () => undefined, warn: (message) => warnings.push(message) },
    });
    expect(warnings).toEqual(["[quantify] 1 record issue(s): 1 RESOLVE_SAMPLE_UNRESOLVED"]);
  });

  it("writes the run report as JSON", async () => {
    const reportPath = join(dir, "report.json");
    const run = await runQuantification({
      designPath,
      quantificationPath,
      outputPath,
      reportPath,
      config,
      logger: silentLogger,
    });

    expect(run.reportPath).toBe(reportPath);
    const report: unknown = JSON.parse(await readFile(reportPath, "utf-8"));
    expect(report).toMatchObject({
      issueCount: 1,
      counts: { RESOLVE_SAMPLE_UNRESOLVED: 1 },
      issues: [{ code: "RESOLVE_SAMPLE_UNRESOLVED" }],
    });
  });

  it("reads the amplicon layout", async () => {
    await writeFile(quantificationPath, AMPLICON);
    const run = await runQuantification({
      designPath,
      quantificationPath,
      outputPath,
      config: validateConfig({ input: { layout: "amplicon" } }),
      logger: silentLogger,
    });

    const summary = run.summaries[1];
    expect(summary?.key).toBe("HEK3_P13_R10");
    expect(summary?.totalReads).toBe(20);
    expect(summary?.counts).toEqual({
      intended_edit: 10,
      unintended_edit: 1,
      indel: 2,
      unmodified: 6,
      unclassified: 1,
    });
    expect(run.report.hasIssues).toBe(false);
  });

  it("produces identical bytes on repeated runs", async () => {
    const second = join(dir, "again.tsv");
    await runQuantification({ designPath, quantificationPath, outputPath, config, logger: silentLogger });
    await runQuantification({
      designPath,
      quantificationPath,
      outputPath: second,
      config,
      logger: silentLogger,
    });
    expect((await readFile(second)).equals(await readFile(outputPath))).toBe(true);
  });

  it("creates no output when the design database is missing", async () => {
    await expect(
      runQuantification({
        designPath: join(dir, "missing.tsv"),
        quantificationPath,
        outputPath,
        logger: silentLogger,
      }),
    ).rejects.toBeInstanceOf(InputFileNotFoundError);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("leaves a previous output untouched on a fatal input error", async () => {
    await writeFile(outputPath, "previous\n");
    await writeFile(quantificationPath, "sample\tintended_edit\nS1\tmany\n");

    await expect(
      runQuantification({ designPath, quantificationPath, outputPath, logger: silentLogger }),
    ).rejects.toBeInstanceOf(InputSchemaError);
    expect(await readFile(outputPath, "utf-8")).toBe("previous\n");
  });

  it("stops when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runQuantification({
        designPath,
        quantificationPath,
        outputPath,
        signal: controller.signal,
        logger: silentLogger,
      }),
    ).rejects.toThrow(new RunAbortedError("load").message);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("writes no summary when the run report cannot be written", async () => {
    const reportPath = join(dir, "missing-dir", "report.json");

    const error: unknown = await runQuantification({
      designPath,
      quantificationPath,
      outputPath,
      reportPath,
      config,
      logger: silentLogger,
    }).catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(OutputWriteError);
    if (error instanceof OutputWriteError) {
      expect(error.filePath).toBe(reportPath);
    }
    expect(await fileExists(outputPath)).toBe(false);
    expect((await readdir(dir)).sort()).toEqual(["counts.tsv", "designs.tsv"]);
  });

  it("keeps a previous summary when the run report cannot be written", async () => {
    await writeFile(outputPath, "previous\n");

    await expect(
      runQuantification({
        designPath,
        quantificationPath,
        outputPath,
        reportPath: join(dir, "missing-dir", "report.json"),
        logger: silentLogger,
      }),
    ).rejects.toBeInstanceOf(OutputWriteError);
    expect(await readFile(outputPath, "utf-8")).toBe("previous\n");
  });

  it("writes neither file when aborted after aggregation", async () => {
    const controller = new AbortController();
    const reportPath = join(dir, "report.json");

    await expect(
      runQuantification({
        designPath,
        quantificationPath,
        outputPath,
        reportPath,
        config,
        signal: controller.signal,
        logger: { info: () => undefined, warn: () => controller.abort() },
      }),
    ).rejects.toThrow(new RunAbortedError("write").message);
    expect(await fileExists(outputPath)).toBe(false);
    expect(await fileExists(reportPath)).toBe(false);
    expect((await readdir(dir)).sort()).toEqual(["counts.tsv", "designs.tsv"]);
  });
});
