import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ANALYSIS_MODES, type AnalysisMode } from "@deepxcheck/core";
import { REPORT_FORMATS, type ReportFormat } from "@deepxcheck/reporter";
import {
  LOG_LEVELS,
  createStderrLogger,
  parseLogLevel,
  type LogLevel,
} from "./application/logger.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("deepxcheck")
  .description("Rule-based manipulation risk scoring for social-media profiles")
  .version(version);

program
  .command("analyze")
  .argument("<profile>", "path to a JSON file holding one profile object or an array of them")
  .addOption(
    new Option(
      "--mode <mode>",
      "disclosure mode: discovery (anonymized), investigation (masked) or expert (full detail)",
    )
      .choices([...ANALYSIS_MODES])
      .default("discovery"),
  )
  .addOption(
    new Option("--format <format>", "output format: text, json, md")
      .choices([...REPORT_FORMATS])
      .default("text"),
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices([...LOG_LEVELS])
      .default(parseLogLevel(process.env["DEEPXCHECK_LOG_LEVEL"])),
  )
  .option(
    "--config <path>",
    "JSON file with risk engine overrides (defaults to $DEEPXCHECK_CONFIG)",
    process.env["DEEPXCHECK_CONFIG"],
  )
  .option("--output <path>", "also write the rendered report to this file")
  .option("--explain", "include the evaluation of every check in the report", false)
  .action(
    async (
      profilePath: string,
      options: {
        mode: AnalysisMode;
        format: ReportFormat;
        logLevel: LogLevel;
        config?: string;
        output?: string;
        explain: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const { reports, rendered } = await runAnalyzeCommand(
        profilePath,
        {
          mode: options.mode,
          format: options.format,
          explain: options.explain,
          ...(options.config === undefined ? {} : { configPath: options.config }),
          ...(options.output === undefined ? {} : { outputPath: options.output }),
        },
        logger,
      );
      logger.info(`analysis completed (${reports.length} report(s))`);
      process.stdout.write(`${rendered}\n`);
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

try {
  await program.parseAsync(argv);
} catch (error) {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  process.stderr.write(`[deepxcheck] ERROR ${message}\n`);
  process.exitCode = 1;
}
