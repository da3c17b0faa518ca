import type { GeneratorConfig } from "../config/generator-config.js";
import type { GenerationReport } from "../generator/fixture-generator.js";
import { basicLogger, type Logger } from "../logging/logger.js";
import { createNodeGenerator } from "../presets/node.js";

export interface RunOptions {
  logger?: Logger;
  cwd?: string;
}

/** Runs each generator to completion before starting the next. */
export async function runGenerators(
  configs: GeneratorConfig[],
  options: RunOptions = {},
): Promise<GenerationReport[]> {
  const logger = options.logger ?? basicLogger();
  const reports: GenerationReport[] = [];
  for (const config of configs) {
    const generator = createNodeGenerator({ config, logger, cwd: options.cwd });
    reports.push(await generator.generate());
  }
  return reports;
}

export function runMain(configs: GeneratorConfig[]): void {
  runGenerators(configs).catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
}
