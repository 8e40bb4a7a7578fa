import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodError } from "zod/v3";
import { envSchema, fileConfigSchema } from "./schema";
import type { AppConfig, ProviderConfig, ProviderKind } from "./schema";

type Env = Readonly<Record<string, string | undefined>>;

export type InvalidSetting = Readonly<{
  setting: string;
  value: string;
  fallback: string;
}>;

function formatIssues(error: ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
    .join("\n");
}

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim().length > 0 ? value : null;
}

export const DEFAULT_SMTP_PORT = 587;

/** Reads a TCP port, or null when the value is not a whole number in range. */
export function parsePort(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const port = Number(value.trim());
  return port > 0 && port <= 65535 ? port : null;
}

export function loadConfig(configPath: string, env: Env = process.env): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const fileResult = fileConfigSchema.safeParse(parsed);
  if (!fileResult.success) {
    throw new Error(
      `invalid configuration in ${configPath}:\n${formatIssues(fileResult.error)}`,
    );
  }

  // empty strings count as unset, the way a blank line in .env reads
  const envInput = Object.fromEntries(
    Object.entries(env).filter(([, value]) => nonEmpty(value) !== null),
  );
  const envResult = envSchema.safeParse(envInput);
  if (!envResult.success) {
    throw new Error(
      `invalid environment variables:\n${formatIssues(envResult.error)}`,
    );
  }

  const file = fileResult.data;
  const vars = envResult.data;

  const providers: Array<ProviderConfig> = file.summarizer.providers.map(
    (provider) => ({
      ...provider,
      apiKey: provider.apiKeyEnv ? nonEmpty(env[provider.apiKeyEnv]) : null,
    }),
  );

  const from = vars.EMAIL_FROM ?? null;

  return Object.freeze({
    sources: {
      concurrency: file.sources.concurrency,
      rss: file.sources.rss,
      newsApi: {
        ...file.sources.newsApi,
        apiKey: vars.NEWSDATAIO_API_KEY ?? null,
      },
    },
    summarizer: {
      timeoutMs: file.summarizer.timeoutMs,
      maxOutputTokens: file.summarizer.maxOutputTokens,
      prompt: file.summarizer.prompt,
      providers,
    },
    delivery: {
      subject: file.delivery.subject,
      from,
      to: vars.EMAIL_TO ?? null,
      smtp: {
        host: vars.SMTP_SERVER,
        port: parsePort(vars.SMTP_PORT) ?? DEFAULT_SMTP_PORT,
        user: vars.SMTP_USER ?? from,
        password: vars.SMTP_PASSWORD ?? null,
      },
    },
  });
}

/** Provider kinds that cannot be called without an API key. */
export function requiresApiKey(kind: ProviderKind): boolean {
  return kind !== "ollama";
}

/**
 * Lists settings the run will likely need but that are absent. Nothing here
 * is fatal: each stage degrades on its own when its setting is missing.
 */
export function findMissingSettings(config: AppConfig): ReadonlyArray<string> {
  const missing: Array<string> = [];

  for (const provider of config.summarizer.providers) {
    if (requiresApiKey(provider.kind) && provider.apiKey === null) {
      missing.push(provider.apiKeyEnv ?? `api key for provider ${provider.name}`);
    }
  }

  if (
    config.sources.newsApi.queries.length > 0 &&
    config.sources.newsApi.apiKey === null
  ) {
    missing.push("NEWSDATAIO_API_KEY");
  }

  if (config.delivery.to === null) missing.push("EMAIL_TO");
  if (config.delivery.from === null) missing.push("EMAIL_FROM");

  if (config.delivery.smtp.password === null) missing.push("SMTP_PASSWORD");

  return missing;
}

/**
 * Lists environment settings that are present but unusable, each of which
 * `loadConfig` has replaced with its default.
 */
export function findInvalidSettings(
  env: Env = process.env,
): ReadonlyArray<InvalidSetting> {
  const invalid: Array<InvalidSetting> = [];

  const port = nonEmpty(env["SMTP_PORT"]);
  if (port !== null && parsePort(port) === null) {
    invalid.push({
      setting: "SMTP_PORT",
      value: port,
      fallback: String(DEFAULT_SMTP_PORT),
    });
  }

  return invalid;
}

export type {
  AppConfig,
  DeliveryConfig,
  NewsApiQuery,
  PromptConfig,
  ProviderConfig,
  ProviderKind,
  RssFeedConfig,
  SmtpConfig,
  SourcesConfig,
  SummarizerConfig,
} from "./schema";
