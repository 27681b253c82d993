/**
 * Config command - Shows where the user config lives and what is in effect
 */

import chalk from "chalk";
import { getUserConfigPath, loadConfig, fileExists } from "../../utils";

export async function configCommand(): Promise<void> {
  const userConfigPath = getUserConfigPath();
  const exists = await fileExists(userConfigPath);

  console.log(`\n  ${chalk.bold("User config")} ${chalk.dim(userConfigPath)}`);
  console.log(
    `  ${exists ? chalk.green("✔ found") : chalk.dim("· not created (defaults in use)")}`,
  );

  const { config, errors } = await loadConfig();
  for (const { path, error } of errors) {
    const details = error instanceof Error ? error.message : String(error);
    console.log(`  ${chalk.red("✖")} ${path}: ${chalk.dim(details)}`);
  }

  console.log(`\n${JSON.stringify(config, null, 2)}\n`);
}
