/**
 * Converter - Pipeline orchestrator
 * Coordinates the export pipeline with zero business logic
 */

import type {
  ConversionConfig,
  ConversionContext,
  MarkupParser,
  PageStorage,
  ProcessingStats,
} from "./types";
import { Logger, Tracker } from "./utils";
import * as modules from "./modules";

export interface ConverterOptions {
  storage?: PageStorage; // Defaults to the directory named by config.wiki
  parser?: MarkupParser; // Defaults to WikiParser
  logger?: Logger;
}

export class Converter {
  constructor(
    private config: ConversionConfig,
    private options: ConverterOptions = {},
  ) {}

  /**
   * Run the export pipeline
   * Writes every page and stats.json; display is left to the caller.
   */
  async run(): Promise<ProcessingStats> {
    const tracker = new Tracker();
    const ctx: ConversionContext = {
      config: this.config,
      tracker,
      logger: this.options.logger ?? new Logger(this.config.logging.level),
      storage: this.options.storage,
      parser: this.options.parser,
    };

    await modules.scan(ctx);
    await modules.process(ctx);
    await tracker.exportStats(this.config.output.directory);

    return tracker.getStats();
  }
}
