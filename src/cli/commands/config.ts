/**
 * Config command - Show configuration file location
 */

import { getDefaultConfigPath, getUserConfigPath } from "../../utils";

export function configCommand(): void {
  console.log("User configuration file location:");
  console.log(getUserConfigPath());
  console.log("\nCreate this file to customize fetch, run, output and logging settings.");
  console.log(`See ${getDefaultConfigPath()} for available options.`);
}
