import { existsSync, mkdirSync, writeFileSync } from "fs";
import chalk from "chalk";
import { join } from "path";
import type { GeneratorConfig } from "./config.js";
import { deriveSubstitutions } from "./naming.js";
import { renderTemplate } from "./template.js";

/**
 * Renders the page template once per configured component and writes
 * `<name>_page<ext>` into the target directory.
 *
 * Everything runs synchronously in list order. The first failure
 * propagates as is; files written before it are left on disk.
 */
export class PageGenerator {
  constructor(private readonly config: GeneratorConfig) {}

  /** Returns the paths written, in list order. */
  run(): string[] {
    const { components, targetDir, extension, template } = this.config;

    if (!existsSync(targetDir)) {
      mkdirSync(targetDir, { recursive: true });
      console.log(chalk.cyan(`Created directory: ${targetDir}`));
    }

    console.log(chalk.cyan("\nStarting file generation..."));

    const written: string[] = [];
    for (const name of components) {
      const substitutions = deriveSubstitutions(name, extension);
      const content = renderTemplate(template, substitutions);
      const filePath = join(targetDir, substitutions.fileName);

      writeFileSync(filePath, content, "utf8");
      console.log(chalk.gray(`  -> Successfully created ${filePath}`));
      written.push(filePath);
    }

    console.log(chalk.green("\nFile generation complete!\n"));
    return written;
  }
}
