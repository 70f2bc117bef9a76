/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize apps, preview and registry settings.");
  console.log("See src/config/default.json for available options.");
  console.log("Registry credentials can also be set with SHLINK_API_URI and SHLINK_API_KEY.");
}
