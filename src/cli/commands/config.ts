/**
 * Config command - Show configuration file location or the merged configuration
 */

import { z } from "zod";
import { Logger, errorMessage, getUserConfigPath, loadConfig } from "../../utils";

const ConfigOptionsSchema = z.object({
  config: z.string().optional(),
  show: z.boolean().optional(),
});

type Options = z.infer<typeof ConfigOptionsSchema>;

export async function configCommand(opts: Options): Promise<void> {
  const options = ConfigOptionsSchema.parse(opts);

  if (!options.show) {
    console.log("User configuration file location:");
    console.log(getUserConfigPath());
    console.log("\nCreate this file to customize conversion settings.");
    console.log("See src/config/default.json for available options.");
    return;
  }

  try {
    const { config, errors } = await loadConfig(options.config);
    const logger = new Logger(config.logging.level);
    for (const err of errors) {
      logger.warn(`Ignoring config ${err.path}: ${errorMessage(err.error)}`);
    }
    console.log(JSON.stringify(config, null, 2));
  } catch (error) {
    new Logger("info").error(errorMessage(error));
    process.exitCode = 1;
  }
}
