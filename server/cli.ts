#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { ZodError } from "zod";
import { runOptimization, type OptimizeConfigInput } from "./optimizer";
import { EXIT_CODES, exitCodeFor, errorMessage } from "./optimizer/errors";

interface CliOptions {
  useBrave?: boolean;
  useChrome?: boolean;
  extractCriticalCss?: boolean;
  optimizeAndTest?: boolean;
  outputDir?: string;
  concurrency?: number;
  timeoutMs?: number;
  runTimeoutMs?: number;
  auditTimeoutMs?: number;
  userAgent?: string;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function toConfig(url: string | undefined, options: CliOptions): OptimizeConfigInput {
  return {
    ...(url ? { url } : {}),
    ...(options.useChrome ? { browser: "chrome" as const } : options.useBrave ? { browser: "brave" as const } : {}),
    ...(options.extractCriticalCss !== undefined ? { extractCriticalCss: options.extractCriticalCss } : {}),
    ...(options.optimizeAndTest !== undefined ? { optimizeAndTest: options.optimizeAndTest } : {}),
    ...(options.outputDir ? { outputDir: options.outputDir } : {}),
    ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
    ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    ...(options.runTimeoutMs !== undefined ? { runTimeoutMs: options.runTimeoutMs } : {}),
    ...(options.auditTimeoutMs !== undefined ? { auditTimeoutMs: options.auditTimeoutMs } : {}),
    ...(options.userAgent ? { userAgent: options.userAgent } : {}),
  };
}

const program = new Command();

program
  .name("site-speedup")
  .description("Audit a page, build an optimized local copy and compare the two")
  .version("1.0.0")
  .argument("[url]", "URL of the page to optimize (default: https://example.com)")
  .option("--use-brave", "Run the analyzer in Brave, falling back to Chrome (default)")
  .option("--use-chrome", "Run the analyzer in Chrome only")
  .option("--extract-critical-css", "Extract critical CSS (default)")
  .option("--no-extract-critical-css", "Skip critical CSS extraction")
  .option("--optimize-and-test", "Build the optimized copy and compare it with the original (default)")
  .option("--no-optimize-and-test", "Only analyze the original page")
  .option("--output-dir <dir>", "Work directory; output goes to <dir>/<domain> (default: implementation-tests)")
  .option("--concurrency <number>", "Number of concurrent resource fetches", parseInteger)
  .option("--timeout-ms <number>", "Per-request timeout in milliseconds", parseInteger)
  .option("--run-timeout-ms <number>", "Overall run timeout in milliseconds", parseInteger)
  .option("--audit-timeout-ms <number>", "Analyzer timeout in milliseconds", parseInteger)
  .option("--user-agent <string>", "User agent string")
  .action(async (url: string | undefined, options: CliOptions) => {
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());

    try {
      const result = await runOptimization(toConfig(url, options), { signal: controller.signal });

      console.log(JSON.stringify(result, null, 2));

      process.exit(EXIT_CODES.ok);
    } catch (error) {
      const message = error instanceof ZodError ? `Invalid configuration: ${error.issues.map((i) => i.message).join("; ")}` : errorMessage(error);
      console.error(
        JSON.stringify(
          {
            error: true,
            message: message || "Unknown error occurred",
          },
          null,
          2
        )
      );
      process.exit(exitCodeFor(error));
    }
  });

await program.parseAsync();
