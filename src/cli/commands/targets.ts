/**
 * Targets command - List separators and the apps they select
 */

import chalk from "chalk";
import { z } from "zod";
import { AppTargetTable, loadConfig } from "../../utils";

const TargetsOptionsSchema = z.object({
  config: z.string().optional(),
});

type Options = z.infer<typeof TargetsOptionsSchema>;

export async function targetsCommand(opts: Options): Promise<void> {
  const options = TargetsOptionsSchema.parse(opts);
  const { config } = await loadConfig(options.config);
  const table = AppTargetTable.fromConfig(config.apps);

  console.log("separators:");
  for (const target of table.targets) {
    const header = target.separator.repeat(config.parser.separatorLength);
    console.log(`${chalk.hex(target.color).bold(header)} ${target.uri}`);
  }
}
