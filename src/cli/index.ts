#!/usr/bin/env node
/**
 * Riposte CLI entry point
 *
 * Commands:
 * - serve      - HTTP API plus the background cycle driver
 * - cycle      - Run one Scout → Red-Team → Adapt cycle
 * - classify   - Classify a raw request through the stage pipeline
 * - scout      - Discover new techniques
 * - redteam    - Attack the pipeline with catalogued techniques
 * - rules      - List rule versions or show one
 * - techniques - List the technique catalog
 * - stats      - Aggregate counters
 */

import { readFileSync } from "fs";

import { Command, Option } from "commander";
import ora from "ora";

import { loadConfig } from "../config/index.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { createRuntime, type Runtime } from "../runtime.js";
import { startServer } from "../server/index.js";
import { ATTACK_CATEGORIES } from "../store/schema.js";
import { VERSION } from "../version.js";

import {
  formatCycleSummary,
  formatError,
  formatRedTeamReport,
  formatRule,
  formatRuleHistory,
  formatScoutReport,
  formatStats,
  formatTechniques,
  formatVerdict,
  isValidOutputFormat,
  render,
  type OutputFormat,
} from "./formatters.js";

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const program = new Command();

program
  .name("riposte")
  .description("Self-adapting web application firewall core")
  .version(VERSION)
  .option("-c, --config <file>", "YAML configuration file")
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Quiet mode (errors only)");

function formatOption(): Option {
  return new Option("-o, --output <format>", "Output format: terminal, json").default("terminal");
}

function outputFormat(options: Record<string, unknown>): OutputFormat {
  const format = String(options["output"] ?? "terminal");
  if (!isValidOutputFormat(format)) {
    throw new Error(`Invalid output format: ${format}. Use: terminal, json`);
  }
  return format;
}

async function openRuntime(): Promise<Runtime> {
  const globals = program.opts<GlobalOptions>();
  const config = loadConfig(globals.config ? { file: globals.config } : {});

  logger.configure({ level: config.logLevel });
  if (globals.quiet) {
    logger.configure({ level: "error" });
  } else if (globals.verbose) {
    logger.configure({ level: "debug" });
  }

  return createRuntime(config);
}

/**
 * Run `action` against a fresh runtime, closing it afterwards and mapping
 * failures onto a non-zero exit code
 */
async function withRuntime(action: (runtime: Runtime) => Promise<void>): Promise<void> {
  let runtime: Runtime | null = null;
  try {
    runtime = await openRuntime();
    await action(runtime);
  } catch (error) {
    console.error(formatError(error instanceof Error ? error : new Error(errorMessage(error))));
    process.exitCode = 1;
  } finally {
    await runtime?.close();
  }
}

program
  .command("serve")
  .description("Serve the HTTP API and run cycles in the background")
  .option("-p, --port <port>", "Port to listen on")
  .action(async (options: Record<string, unknown>) => {
    let runtime: Runtime;
    try {
      runtime = await openRuntime();
    } catch (error) {
      console.error(formatError(error instanceof Error ? error : new Error(errorMessage(error))));
      process.exit(1);
    }
    logger.configure({ timestamps: true });

    const port = options["port"] === undefined ? runtime.config.port : Number(options["port"]);
    const server = await startServer(runtime, port);

    const shutdown = (): void => {
      logger.info("Shutting down...");
      server.close();
      runtime.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

program
  .command("cycle")
  .description("Run one Scout → Red-Team → Adapt cycle")
  .addOption(formatOption())
  .action(async (options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const format = outputFormat(options);
      const spinner = format === "terminal" && !program.opts<GlobalOptions>().quiet ? ora("Running cycle...").start() : null;
      try {
        const summary = await runtime.driver.trigger();
        spinner?.succeed(`Cycle #${summary.cycleId} complete`);
        console.log(render(summary, format, formatCycleSummary));
      } catch (error) {
        spinner?.fail("Cycle failed");
        throw error;
      }
    });
  });

program
  .command("classify [request]")
  .description("Classify a raw HTTP request")
  .option("-f, --file <path>", "Read the raw request from a file")
  .addOption(formatOption())
  .action(async (request: string | undefined, options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const format = outputFormat(options);
      const file = options["file"];
      const raw = typeof file === "string" ? readFileSync(file, "utf-8") : request;
      if (!raw) {
        throw new Error("Provide a request string or --file");
      }
      const outcome = await runtime.pipeline.classify(raw);
      console.log(render(outcome, format, formatVerdict));
    });
  });

program
  .command("scout")
  .description("Discover new attack techniques")
  .addOption(formatOption())
  .action(async (options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const report = await runtime.scout.run({});
      console.log(render(report, outputFormat(options), formatScoutReport));
    });
  });

program
  .command("redteam")
  .description("Attack the pipeline with catalogued techniques")
  .addOption(formatOption())
  .action(async (options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const report = await runtime.redTeam.run();
      console.log(render(report, outputFormat(options), formatRedTeamReport));
    });
  });

program
  .command("rules")
  .description("List rule versions")
  .option("-s, --show [version]", "Print the instructions of a version (current when omitted)")
  .addOption(formatOption())
  .action(async (options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const format = outputFormat(options);
      const show = options["show"];
      if (show === undefined) {
        console.log(render(await runtime.storage.rules.history(), format, formatRuleHistory));
        return;
      }
      const rule = typeof show === "string"
        ? await runtime.storage.rules.get(Number(show))
        : await runtime.storage.rules.current();
      if (!rule) {
        throw new Error(`Rule version not found: ${String(show)}`);
      }
      console.log(render(rule, format, formatRule));
    });
  });

program
  .command("techniques")
  .description("List the technique catalog")
  .addOption(new Option("--category <category>", "Only this category").choices(ATTACK_CATEGORIES))
  .addOption(formatOption())
  .action(async (options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const category = options["category"];
      const all = await runtime.storage.techniques.all();
      const techniques = category === undefined ? all : all.filter((t) => t.category === category);
      console.log(render(techniques, outputFormat(options), formatTechniques));
    });
  });

program
  .command("stats")
  .description("Show aggregate counters")
  .addOption(formatOption())
  .action(async (options: Record<string, unknown>) => {
    await withRuntime(async (runtime) => {
      const [stats, categories] = await Promise.all([
        runtime.storage.stats.current(),
        runtime.storage.techniques.categoryStats(),
      ]);
      console.log(render({ stats, categories }, outputFormat(options), (v) => formatStats(v.stats, v.categories)));
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatError(error instanceof Error ? error : new Error(errorMessage(error))));
  process.exit(1);
});
