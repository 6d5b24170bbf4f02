#!/usr/bin/env node

import { Command } from "commander";
import { run, describeScenarios } from "./commands/run.js";
import { listReleases } from "./commands/list.js";
import { status, listRuns } from "./commands/status.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { loadConfig } from "./config/loader.js";
import { createReporter, parseFormat, type OutputFormat } from "./report/reporter.js";
import { errorMessage } from "./core/errors.js";

const program = new Command();

program
  .name("ilpcompat")
  .description("Check ILP client compatibility across database server releases")
  .version("0.1.0");

function toInt(value: string): number {
  return Number(value);
}

function fail(format: OutputFormat, error: { code: string; message: string }, exitCode: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: error.code, message: error.message }) + "\n");
  } else {
    console.error(error.message);
  }
  process.exit(exitCode);
}

program
  .command("list")
  .description("List the newest installable server versions")
  .option("-n, --count <n>", "Number of versions to list", toInt)
  .option("--env <name>", "Config overlay to load (config/<name>.yaml)")
  .option("--config <path>", "Path to config directory")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { count?: number; env?: string; config?: string; format: string }) => {
    const format = parseFormat(opts.format);
    const res = await listReleases({ count: opts.count, env: opts.env, configDir: opts.config });
    if (!res.ok) fail(format, res.error, res.exitCode);

    for (const r of res.releases) {
      if (format === "jsonl") process.stdout.write(JSON.stringify(r) + "\n");
      else console.log(r.version);
    }
  });

program
  .command("run")
  .description("Run the behaviour suite against one or more server versions")
  .option("--last-n <n>", "Test the newest N versions", toInt)
  .option("--versions <versions...>", "Test these versions (globs allowed, e.g. 7.3.*)")
  .option("--filter <patterns...>", "Only run scenarios matching these names or globs")
  .option("--fail-fast", "Skip remaining scenarios of a version after its first failure")
  .option("--continue-on-failure", "Keep testing later versions after one fails")
  .option("--list-scenarios", "Print the scenarios and their version gates, then exit")
  .option("--env <name>", "Config overlay to load (config/<name>.yaml)")
  .option("--config <path>", "Path to config directory")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (opts: {
      lastN?: number;
      versions?: string[];
      filter?: string[];
      failFast?: boolean;
      continueOnFailure?: boolean;
      listScenarios?: boolean;
      env?: string;
      config?: string;
      format: string;
    }) => {
      const format = parseFormat(opts.format);

      if (opts.listScenarios) {
        for (const s of describeScenarios()) {
          if (format === "jsonl") {
            process.stdout.write(JSON.stringify(s) + "\n");
          } else {
            const gate = s.skip_at_or_below ? `  (skipped at or below ${s.skip_at_or_below}: ${s.reason})` : "";
            console.log(`${s.name}  ${s.description}${gate}`);
          }
        }
        return;
      }

      const res = await run({
        lastN: opts.lastN,
        versions: opts.versions,
        filter: opts.filter,
        failFast: opts.failFast,
        continueOnFailure: opts.continueOnFailure,
        env: opts.env,
        configDir: opts.config,
        reporter: createReporter(format)
      });
      if (!res.ok) fail(format, res.error, res.exitCode);
      process.exitCode = res.exitCode;
    }
  );

program
  .command("status")
  .description("Show past runs, or one run's report")
  .argument("[runId]", "Run ID (omit to list all)")
  .option("--reports-dir <path>", "Reports directory (default: reports_dir from config)")
  .option("--env <name>", "Config overlay to load (config/<name>.yaml)")
  .option("--config <path>", "Path to config directory")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((runId: string | undefined, opts: { reportsDir?: string; env?: string; config?: string; format: string }) => {
    const format = parseFormat(opts.format);
    let reportsDir = opts.reportsDir;
    if (!reportsDir) {
      try {
        reportsDir = loadConfig(opts.env, opts.config).reports_dir;
      } catch (e) {
        fail(format, { code: "CONFIG_INVALID", message: errorMessage(e) }, EXIT.INVALID_ARGS);
      }
    }

    if (runId) {
      const res = status({ reportsDir, runId });
      if (!res.ok) fail(format, { code: "NOT_FOUND", message: res.error }, EXIT.COMPATIBILITY_FAILED);
      if (format === "jsonl") {
        process.stdout.write(JSON.stringify(res.report) + "\n");
      } else {
        console.log(JSON.stringify(res.report, null, 2));
      }
      return;
    }

    const list = listRuns(reportsDir);
    if (format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) { console.log("No runs found."); return; }
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.finished_at}  ${item.versions.join(",")}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(JSON.stringify({ ok: false, error: errorMessage(err) }) + "\n");
  process.exit(exitCodeFor(err));
});
