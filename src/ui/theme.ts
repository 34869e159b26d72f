import chalk from "chalk";

export interface ThemeConfig {
  name: string;
  colors: {
    primary: { main: string; dim: string; bright: string; pale: string };
    success: { main: string; dim: string };
    warning: { main: string; dim: string };
    error: { main: string; dim: string };
    muted: { main: string; dim: string; dark: string };
    text: { secondary: string; disabled: string };
  };
  diff: {
    added: string;
    removed: string;
    hunk: string;
  };
  syntax: {
    code: string;
    heading: string;
    link: string;
  };
  icons: {
    prompt: string;
    agent: string;
    action: string;
    success: string;
    error: string;
    warn: string;
    info: string;
    pipe: string;
  };
}

const ICONS = {
  prompt: "❯",
  agent: "✦",
  action: "◆",
  success: "✓",
  error: "✗",
  warn: "!",
  info: "·",
  pipe: "│",
} as const;

const THEME_DARK: ThemeConfig = {
  name: "ember-dark",
  colors: {
    primary: { main: "#E0975A", dim: "#B8743D", bright: "#F2B27D", pale: "#F5CFA8" },
    success: { main: "#86efac", dim: "#4ade80" },
    warning: { main: "#fde047", dim: "#fbbf24" },
    error: { main: "#f87171", dim: "#dc2626" },
    muted: { main: "#a39282", dim: "#7d6d5e", dark: "#5a4c40" },
    text: { secondary: "#a8a098", disabled: "#726b64" },
  },
  diff: { added: "#86efac", removed: "#f87171", hunk: "#7dd3fc" },
  syntax: { code: "#d6c2ad", heading: "#F2B27D", link: "#E0975A" },
  icons: { ...ICONS },
};

const THEME_LIGHT: ThemeConfig = {
  name: "ember-light",
  colors: {
    primary: { main: "#a3541d", dim: "#864415", bright: "#c0692b", pale: "#b8743d" },
    success: { main: "#16a34a", dim: "#15803d" },
    warning: { main: "#ca8a04", dim: "#a16207" },
    error: { main: "#dc2626", dim: "#b91c1c" },
    muted: { main: "#7a6a5a", dim: "#65574a", dark: "#4d4238" },
    text: { secondary: "#675f58", disabled: "#80786f" },
  },
  diff: { added: "#15803d", removed: "#b91c1c", hunk: "#0369a1" },
  syntax: { code: "#57483a", heading: "#864415", link: "#a3541d" },
  icons: { ...ICONS },
};

function isDarkMode(): boolean {
  const colorFgBg = process.env.COLORFGBG;
  if (!colorFgBg) return true;
  const bg = colorFgBg.split(";")[1]?.trim();
  if (bg === "default" || !bg) return true;
  const n = parseInt(bg, 10);
  if (Number.isNaN(n)) return true;
  return n <= 7;
}

const theme: ThemeConfig = isDarkMode() ? THEME_DARK : THEME_LIGHT;

export { theme };

export const colors = {
  accent: chalk.hex(theme.colors.primary.main),
  accentPale: chalk.hex(theme.colors.primary.pale),
  accentDim: chalk.hex(theme.colors.primary.dim).dim,
  success: chalk.hex(theme.colors.success.main),
  warn: chalk.hex(theme.colors.warning.main),
  error: chalk.hex(theme.colors.error.main),
  muted: chalk.hex(theme.colors.muted.main),
  mutedDark: chalk.hex(theme.colors.muted.dark),
  output: chalk.hex(theme.colors.muted.dim),
  gray: chalk.hex(theme.colors.text.secondary),
  dim: chalk.hex(theme.colors.text.disabled).dim,
  added: chalk.hex(theme.diff.added),
  removed: chalk.hex(theme.diff.removed),
  hunk: chalk.hex(theme.diff.hunk),
} as const;

/** Raw hex values for libraries that take a color string (boxen, gradient-string). */
export const hexColors = {
  primary: theme.colors.primary.main,
  primaryBright: theme.colors.primary.bright,
  mutedDim: theme.colors.muted.dim,
} as const;

export const icons = theme.icons;
