export * from "./format.js";
export { colors, hexColors, icons, theme } from "./theme.js";
export { ConsoleReporter } from "./reporter.js";
export { ReadlinePrompter } from "./prompt.js";
