import { join } from "path";
import { PAGE_TEMPLATE } from "./page-template.js";

export interface GeneratorConfig {
  readonly components: readonly string[];
  readonly targetDir: string;
  readonly extension: string;
  readonly template: string;
}

// "button" and "home" pages are maintained by hand.
export const COMPONENTS: readonly string[] = Object.freeze([
  "alert",
  "badge",
  "card",
  "checkbox",
  "divider",
  "input",
  "link",
  "loading",
  "progress",
  "radio",
  "select",
  "textarea",
  "toggle",
]);

const TARGET_DIR = join(
  "examples",
  "deepyr_example",
  "lib",
  "pages",
  "component_routes"
);

const FILE_EXTENSION = ".dart";

export const defaultConfig: GeneratorConfig = Object.freeze({
  components: COMPONENTS,
  targetDir: TARGET_DIR,
  extension: FILE_EXTENSION,
  template: PAGE_TEMPLATE,
});
