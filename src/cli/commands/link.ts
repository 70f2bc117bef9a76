/**
 * Link command - Loads config and runs the linking pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  AppTargetTable,
  formatProgress,
  isLinkerError,
  loadConfig,
  Logger,
  Tracker,
} from "../../utils";
import * as modules from "../../modules";
import type { LinkerContext } from "../../types";

const LinkOptionsSchema = z.object({
  data: z.string(),
  fast: z.boolean().default(false),
  preview: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  withDebug: z.boolean().default(false),
  config: z.string().optional(),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

type Options = z.input<typeof LinkOptionsSchema>;

export async function linkCommand(opts: Options): Promise<void> {
  const logger = new Logger();
  const spinner = ora({ indent: 2 });

  try {
    // Validate CLI options
    const options = LinkOptionsSchema.parse(opts);

    // Load configuration (default → user → custom → environment)
    const { config, errors } = await loadConfig(options.config);
    logger.setLevel(options.verbose ? "debug" : config.logging.level);

    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
      logger.warn(`ignoring config from ${err.path}`);
    }

    const ctx: LinkerContext = {
      config,
      targets: AppTargetTable.fromConfig(config.apps),
      options,
      tracker,
      logger,
      // The spinner starts with the first report, after the resolver's log
      onProgress: (nodes) => {
        const text = formatProgress(nodes, options.quiet);
        if (spinner.isSpinning) {
          spinner.text = text;
        } else {
          spinner.start(text);
        }
      },
    };

    await modules.parse(ctx);
    await modules.link(ctx);
    await modules.preview(ctx);

    if (!options.dryRun) {
      await modules.resolve(ctx);
      spinner.succeed(formatProgress(ctx.nodes ?? [], options.quiet));
      logger.info(`resolved ${ctx.nodes?.length ?? 0} links`);
    }

    await modules.stats(ctx);
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail("Linking failed");
    }
    if (isLinkerError(error)) {
      logger.error(error.message, error);
    } else {
      logger.error("Linking failed unexpectedly");
      console.error(error);
    }
    process.exit(1);
  }
}
