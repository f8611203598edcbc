import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { getDefaultConfig, getGlobalConfigDir } from "../config";

export interface InitOptions {
  local?: boolean;
}

/** Path the config is written to: ./config.yaml with --local, the global one otherwise. */
export function initConfigPath(options: InitOptions, cwd: string = process.cwd()): string {
  return options.local ? join(cwd, "config.yaml") : join(getGlobalConfigDir(), "config.yaml");
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();
  const configPath = initConfigPath(options);

  if (!options.local) {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
  }

  if (existsSync(configPath)) {
    spinner.info(`Config file already exists: ${configPath}`);
  } else {
    spinner.start("Creating config file...");
    writeFileSync(configPath, getDefaultConfig());
    spinner.succeed(`Created config file: ${configPath}`);
  }

  console.log("\nNext steps:");
  console.log(`1. Edit scanDirs in ${configPath}`);
  console.log("2. Run: geosnag run              (dry run, nothing is written)");
  console.log("3. Run: geosnag run --apply      (write GPS data)");
}
