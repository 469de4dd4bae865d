/**
 * Download command - Loads config and runs the harvest loop
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  ensureDirectory,
  Logger,
  ConfigError,
  DecodeError,
} from "../../utils";
import * as modules from "../../modules";
import type { HarvestConfig, HarvestContext } from "../../types";

const DownloadOptionsSchema = z.object({
  key: z.string().optional(),
  dst: z.string().optional(),
  query: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof DownloadOptionsSchema>;

/**
 * Apply CLI flags over the loaded configuration
 */
export function applyOptions(
  config: HarvestConfig,
  options: Options,
): HarvestConfig {
  return {
    ...config,
    api: { key: options.key ?? config.api.key },
    output: { directory: options.dst || config.output.directory },
    search: { query: options.query ?? config.search.query },
    logging: options.verbose
      ? { ...config.logging, level: "debug" }
      : config.logging,
  };
}

export async function downloadCommand(opts: Options): Promise<void> {
  const logger = new Logger();
  const spinner = ora({ text: "Initializing...", indent: 2 });

  try {
    // Validate CLI options
    const options = DownloadOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI flags
    const { config: loaded, errors } = await loadConfig(options.config);
    const config = applyOptions(loaded, options);
    logger.setLevel(config.logging.level);

    for (const { path, error } of errors) {
      logger.warn(
        `Ignoring config ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!config.api.key) {
      throw new ConfigError("no key provided");
    }

    if (!options.dst) {
      logger.info(
        `using default destination "${config.output.directory}" at work directory`,
      );
    }

    await ensureDirectory(config.output.directory);

    const ctx: HarvestContext = {
      config,
      source: new modules.PexelsPageSource(config.api.key, fetch),
      transport: fetch,
      logger,
      onProgress: (state) => {
        spinner.text = `Downloading photos... ${state.photos} saved, page ${state.pages}`;
      },
    };

    if (config.logging.showProgress) {
      spinner.start("Downloading photos...");
    }

    const startTime = Date.now();
    const state = await modules.harvest(ctx);

    spinner.stop();
    modules.stats(ctx, state, Date.now() - startTime);
  } catch (error) {
    spinner.fail("Download failed");

    if (error instanceof DecodeError) {
      logger.error(`${error.message}, body: ${JSON.stringify(error.body)}`);
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    if (error instanceof Error && error.cause !== undefined) {
      logger.debug(String(error.cause));
    }

    process.exit(1);
  }
}
