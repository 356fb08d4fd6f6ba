import { Command } from "commander";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, LogLevel } from "./logger.js";

export const DEFAULT_ANALYTICS_URL = "https://formulae.brew.sh/api/analytics/install/30d.json";
const DEFAULT_TOP_LIMIT = 10;

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const configSchema = z.object({
  dryRun: z.boolean(),
  brewBin: z.string().min(1, "brew binary path must not be empty"),
  logLevel: logLevelSchema,
  analytics: z.object({
    enabled: z.boolean(),
    url: z.string().url("analytics URL must be a valid URL"),
    limit: z.number().int().min(1).max(100)
  })
});

export type AppConfig = z.infer<typeof configSchema>;

interface CliOptions {
  dryRun?: boolean;
  debug?: boolean;
  brew?: string;
  analytics: boolean;
  analyticsUrl?: string;
  top?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name("brewsync")
    .description("Audit Homebrew packages and run a reviewable update/swap plan")
    .option("--dry-run", "print the assembled command chain instead of running it")
    .option("--debug", "show debug logging in the console")
    .option("--brew <path>", "Homebrew executable to invoke")
    .option("--no-analytics", "skip the popular packages feed")
    .option("--analytics-url <url>", "install analytics JSON endpoint")
    .option("--top <n>", "number of popular packages to show");
}

export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const program = buildProgram();
  program.parse(argv, { from: "user" });
  return resolveConfig(program.opts<CliOptions>(), env);
}

export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv): AppConfig {
  const candidate = {
    dryRun: options.dryRun ?? false,
    brewBin: options.brew ?? env.BREWSYNC_BREW_BIN ?? "brew",
    logLevel: options.debug ? "debug" : envLogLevel(env.BREWSYNC_LOG_LEVEL),
    analytics: {
      enabled: options.analytics,
      url: options.analyticsUrl ?? env.BREWSYNC_ANALYTICS_URL ?? DEFAULT_ANALYTICS_URL,
      limit: options.top === undefined ? DEFAULT_TOP_LIMIT : Number(options.top)
    }
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join("; ")})`);
  }

  return parsed.data;
}

function envLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? "warn";
}

export function normalizeTerminalEnv(env: NodeJS.ProcessEnv = process.env): void {
  const term = env.TERM ?? "";
  const termProgram = env.TERM_PROGRAM ?? "";
  const isGhostty = term.toLowerCase().includes("ghostty") || termProgram.toLowerCase().includes("ghostty");

  // blessed has known incompatibilities with some extended terminfo entries from ghostty.
  if (isGhostty) {
    env.TERM = "xterm-256color";
  }
}
