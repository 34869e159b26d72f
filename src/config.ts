import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { EngineSettings } from "./tools/types.js";

const CONFIG_DIR = process.env.XDG_CONFIG_HOME
  ? path.join(process.env.XDG_CONFIG_HOME, "sigilcode")
  : process.platform === "win32"
    ? path.join(process.env.LOCALAPPDATA ?? os.homedir(), "sigilcode")
    : path.join(os.homedir(), ".config", "sigilcode");
const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

export const DEFAULT_MODEL = "anthropic/claude-sonnet-4";

export type StoredConfig = {
  apiKey?: string;
  model?: string;
};

function loadConfigFile(): StoredConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(CONFIG_FILE, "utf-8"));
  } catch {
    return {};
  }
  if (typeof parsed !== "object" || parsed === null) return {};
  const stored: StoredConfig = {};
  if ("apiKey" in parsed && typeof parsed.apiKey === "string") stored.apiKey = parsed.apiKey;
  if ("model" in parsed && typeof parsed.model === "string") stored.model = parsed.model;
  return stored;
}

export function getApiKey(): string | undefined {
  const fromEnv = process.env.OPENROUTER_API_KEY;
  if (fromEnv?.trim()) return fromEnv.trim();
  return loadConfigFile().apiKey?.trim() || undefined;
}

export function getModel(): string {
  const fromEnv = process.env.MODEL;
  if (fromEnv?.trim()) return fromEnv.trim();
  const fromFile = loadConfigFile().model;
  if (fromFile?.trim()) return fromFile.trim();
  return DEFAULT_MODEL;
}

type Env = Record<string, string | undefined>;

type Range = { fallback: number; min: number; max: number };

const RUN_TIMEOUT: Range = { fallback: 300_000, min: 1_000, max: 60 * 60 * 1000 };
const HISTORY_TURNS: Range = { fallback: 15, min: 1, max: 200 };
const FILE_BYTES: Range = { fallback: 50 * 1024, min: 1024, max: 5 * 1024 * 1024 };
const FOLLOW_UPS: Range = { fallback: 3, min: 0, max: 20 };

export const MAX_OUTPUT_CHARS = 10_000;

function clamp(value: number, range: Range): number {
  if (!Number.isFinite(value)) return range.fallback;
  return Math.max(range.min, Math.min(range.max, Math.round(value)));
}

function intFromEnv(raw: string | undefined, range: Range): number {
  const n = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(n) ? clamp(n, range) : range.fallback;
}

function flagFromEnv(raw: string | undefined, fallback: boolean): boolean {
  const v = raw?.trim().toLowerCase();
  if (!v) return fallback;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return true;
}

export type SessionSettings = {
  maxHistoryTurns: number;
  maxFollowUps: number;
  stream: boolean;
  debug: boolean;
};

export type Settings = {
  engine: EngineSettings;
  session: SessionSettings;
};

export function loadSettings(env: Env = process.env): Settings {
  return {
    engine: {
      runTimeoutMs: intFromEnv(env.SIGIL_RUN_TIMEOUT_MS, RUN_TIMEOUT),
      maxFileBytes: intFromEnv(env.SIGIL_MAX_FILE_BYTES, FILE_BYTES),
      maxOutputChars: MAX_OUTPUT_CHARS,
    },
    session: {
      maxHistoryTurns: intFromEnv(env.SIGIL_MAX_HISTORY_TURNS, HISTORY_TURNS),
      maxFollowUps: intFromEnv(env.SIGIL_MAX_FOLLOW_UPS, FOLLOW_UPS),
      stream: flagFromEnv(env.SIGIL_STREAM, true),
      debug: flagFromEnv(env.SIGIL_DEBUG, false),
    },
  };
}

export const config = {
  chatCompletionsUrl: "https://openrouter.ai/api/v1/chat/completions",
} as const;
