import type { FixtureEntry } from "../catalog/types.js";
import type { GeneratorConfig } from "../config/generator-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";

export interface FixtureGeneratorOptions {
  fileSystem: IFileSystem;
  config: GeneratorConfig;
  logger?: Logger;
}

export interface GenerationReport {
  outputDir: string;
  /** Paths written, in catalog order. */
  files: string[];
}

/**
 * Writes every catalog entry to `<outputDir>/<name>`, one at a time, in
 * catalog order. File system errors propagate as-is; files written before
 * the failure are left in place.
 */
export class FixtureGenerator {
  private fileSystem: IFileSystem;
  private config: GeneratorConfig;
  private logger: Logger;

  constructor(options: FixtureGeneratorOptions) {
    this.fileSystem = options.fileSystem;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  async generate(): Promise<GenerationReport> {
    const { outputDir, catalog, kind } = this.config;
    await this.fileSystem.mkdir(outputDir);

    const files: string[] = [];
    for (const entry of catalog) {
      const filePath = joinPath(outputDir, entry.name);
      await this.writeEntry(filePath, entry);
      files.push(filePath);
      this.logger.info(`Created: ${filePath}`);
    }

    this.logger.info(
      `\nGenerated ${files.length} HTTP 1.1 ${kind} files in ${withTrailingSlash(outputDir)}`,
    );
    return { outputDir, files };
  }

  private async writeEntry(filePath: string, entry: FixtureEntry): Promise<void> {
    const { payload } = entry;
    const handle = await this.fileSystem.open(filePath, "w");
    try {
      let position = 0;
      while (position < payload.length) {
        const { bytesWritten } = await handle.write(
          payload,
          position,
          payload.length - position,
          position,
        );
        if (bytesWritten <= 0) {
          throw new Error(`Short write to ${filePath} at byte ${position}`);
        }
        position += bytesWritten;
      }
    } finally {
      await handle.close();
    }
  }
}

function withTrailingSlash(dir: string): string {
  return dir.endsWith("/") ? dir : `${dir}/`;
}

function joinPath(dir: string, name: string): string {
  return `${withTrailingSlash(dir)}${name}`;
}
