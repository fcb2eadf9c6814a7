import { writeFile } from "node:fs/promises";
import type { AnalysisMode, RiskReport } from "@deepxcheck/core";
import { formatReports, type ReportFormat } from "@deepxcheck/reporter";
import { analyzeProfile, type RiskEngineConfigOverrides } from "@deepxcheck/risk-engine";
import { loadConfigOverrides, loadProfiles } from "./load-input.js";
import { createSilentLogger, type Logger } from "./logger.js";

export type AnalyzeCommandOptions = {
  mode: AnalysisMode;
  format: ReportFormat;
  configPath?: string;
  outputPath?: string;
  explain: boolean;
  asOf?: Date;
};

export const runAnalyzeCommand = async (
  inputPath: string,
  options: AnalyzeCommandOptions,
  logger: Logger = createSilentLogger(),
): Promise<{ reports: readonly RiskReport[]; rendered: string }> => {
  let config: RiskEngineConfigOverrides | undefined;
  if (options.configPath !== undefined) {
    logger.info(`loading configuration: ${options.configPath}`);
    config = await loadConfigOverrides(options.configPath);
  }

  logger.info(`loading profiles: ${inputPath}`);
  const profiles = await loadProfiles(inputPath);
  logger.info(`analyzing ${profiles.length} profile(s) in ${options.mode} mode`);

  const reports = profiles.map((profile, index) => {
    const report = analyzeProfile(profile, options.mode, {
      explain: options.explain,
      ...(config === undefined ? {} : { config }),
      ...(options.asOf === undefined ? {} : { asOf: options.asOf }),
    });
    logger.debug(
      `profile ${index + 1}/${profiles.length}: score=${report.assessment.score} level=${report.assessment.level}`,
    );
    if (!report.completeness.complete) {
      logger.warn(
        `profile ${index + 1} is incomplete (missing ${report.completeness.missingFields.join(", ")})`,
      );
    }
    return report;
  });

  const rendered = formatReports(reports, options.format);

  if (options.outputPath !== undefined) {
    await writeFile(options.outputPath, `${rendered}\n`, "utf8");
    logger.info(`report written: ${options.outputPath}`);
  }

  return { reports, rendered };
};
