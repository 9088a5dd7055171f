import chalk from "chalk";
import { defaultConfig, type GeneratorConfig } from "./config.js";
import { PageGenerator } from "./generator.js";

export function main(config: GeneratorConfig = defaultConfig): void {
  try {
    new PageGenerator(config).run();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`File generation failed: ${message}`));
    process.exit(1);
  }
}
