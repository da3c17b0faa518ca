import { NodeFileSystem } from "../adapters/node/node-filesystem.js";
import type { GeneratorConfig } from "../config/generator-config.js";
import { FixtureGenerator } from "../generator/fixture-generator.js";
import type { Logger } from "../logging/logger.js";

export interface NodeGeneratorOptions {
  config: GeneratorConfig;
  logger?: Logger;
  /** Directory relative output paths resolve against. Default: process.cwd() */
  cwd?: string;
}

export function createNodeGenerator(options: NodeGeneratorOptions): FixtureGenerator {
  const fileSystem = new NodeFileSystem(options.cwd);
  return new FixtureGenerator({
    fileSystem,
    config: options.config,
    logger: options.logger,
  });
}
