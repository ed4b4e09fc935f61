/**
 * Convert command - Loads config and runs the export pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";
import {
  ExtensionPolicySchema,
  OutputConfigSchema,
  type ConversionContext,
} from "../../types";

const ConvertOptionsSchema = z.object({
  filePrefix: z.string().optional(),
  filesInOneDir: z.boolean().optional(),
  addLinkExt: z.string().optional(),
  extAppliesTo: ExtensionPolicySchema.optional(),
  format: OutputConfigSchema.shape.format.optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(
  inputConfig: string,
  outputDir: string,
  opts: Options,
): Promise<void> {
  // Validate CLI options
  const parsed = ConvertOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    console.error(z.prettifyError(parsed.error));
    process.exit(1);
  }
  const options = parsed.data;

  // Load configuration (default → user → input config)
  const { config, errors } = await loadConfig(inputConfig);
  const logger = new Logger(options.verbose ? "debug" : config.logging.level);

  // Without its own config there is no wiki to export
  const inputError = errors.find((err) => err.path === inputConfig);
  if (inputError) {
    logger.error(`Cannot load config ${inputConfig}`, inputError.error);
    process.exit(1);
  }

  // Override with CLI options
  config.output.directory = outputDir;
  if (options.filePrefix !== undefined) {
    config.output.filePrefix = options.filePrefix;
  }
  if (options.filesInOneDir) {
    config.output.filesInOneDir = true;
  }
  if (options.addLinkExt !== undefined) {
    config.links.extension = options.addLinkExt;
  }
  if (options.extAppliesTo) {
    config.links.extensionAppliesTo = options.extAppliesTo;
  }
  if (options.format) {
    config.output.format = options.format;
  }

  const tracker = new Tracker();

  // Add any config loading errors to tracker
  for (const err of errors) {
    tracker.trackError(err.path, err.error, "resource");
  }

  const ctx: ConversionContext = {
    config,
    tracker,
    logger,
    verbose: options.verbose,
  };

  // Debug lines would interleave with the spinner
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: config.logging.showProgress && !options.verbose,
  }).start();

  try {
    spinner.text = "Scanning wiki...";
    await modules.scan(ctx);

    spinner.text = "Exporting pages...";
    await modules.process(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    // Export and display stats
    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Export failed");
    console.error(error);
    process.exit(1);
  }
}
