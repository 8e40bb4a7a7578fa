import { z } from "zod/v3";

const rssFeedSchema = z.object({
  name: z.string().min(1).optional(),
  url: z.string().url(),
});

const newsApiQuerySchema = z.object({
  q: z.string().min(1),
  language: z.string().min(1).optional(),
  country: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
});

const providerKindSchema = z.enum([
  "anthropic",
  "openai",
  "gemini",
  "openai-compatible",
  "ollama",
]);

const providerConfigSchema = z.object({
  name: z.string().min(1),
  kind: providerKindSchema,
  model: z.string().min(1),
  baseURL: z.string().url().optional(),
  apiKeyEnv: z.string().min(1).optional(),
  system: z.string().min(1).optional(),
  maxArticles: z.number().int().positive().optional(),
  maxDescriptionLength: z.number().int().positive().optional(),
});

const DEFAULT_FEEDS = [
  { url: "https://rss.nytimes.com/services/xml/rss/nyt/US.xml" },
  { url: "https://rss.nytimes.com/services/xml/rss/nyt/Technology.xml" },
  { url: "https://feeds.content.dowjones.io/public/rss/WSJcomUSBusiness" },
];

/**
 * Shape of the YAML configuration file. Secrets never live here; they come
 * from the environment (see `envSchema`).
 */
export const fileConfigSchema = z.object({
  sources: z
    .object({
      concurrency: z.number().int().positive().default(1),
      rss: z
        .object({
          feeds: z.array(rssFeedSchema).default(DEFAULT_FEEDS),
          maxItemsPerFeed: z.number().int().positive().default(5),
          timeoutMs: z.number().int().positive().default(15000),
        })
        .default({}),
      newsApi: z
        .object({
          endpoint: z.string().url().default("https://newsdata.io/api/1/latest"),
          queries: z.array(newsApiQuerySchema).default([]),
          timeoutMs: z.number().int().positive().default(15000),
        })
        .default({}),
    })
    .default({}),
  summarizer: z.object({
    timeoutMs: z.number().int().positive().default(30000),
    maxOutputTokens: z.number().int().positive().default(2000),
    prompt: z
      .object({
        maxStories: z.number().int().positive().default(10),
        maxThemes: z.number().int().positive().default(4),
        maxWords: z.number().int().positive().default(500),
        requiredTopics: z.array(z.string().min(1)).default(["politics", "markets"]),
      })
      .default({}),
    providers: z.array(providerConfigSchema).min(1),
  }),
  delivery: z
    .object({
      subject: z.string().min(1).default("Daily News for {date}"),
    })
    .default({}),
});

/**
 * Environment variables read once at startup. Presence is not enforced here;
 * absent values are reported by `findMissingSettings`.
 */
export const envSchema = z.object({
  NEWSDATAIO_API_KEY: z.string().min(1).optional(),
  EMAIL_TO: z.string().min(1).optional(),
  EMAIL_FROM: z.string().min(1).optional(),
  SMTP_SERVER: z.string().min(1).default("smtp.gmail.com"),
  // parsed in loadConfig, which falls back to the default port
  SMTP_PORT: z.string().optional(),
  SMTP_USER: z.string().min(1).optional(),
  SMTP_PASSWORD: z.string().min(1).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
export type ProviderKind = z.infer<typeof providerKindSchema>;
export type RssFeedConfig = Readonly<z.infer<typeof rssFeedSchema>>;
export type NewsApiQuery = Readonly<z.infer<typeof newsApiQuerySchema>>;

export type ProviderConfig = Readonly<
  z.infer<typeof providerConfigSchema> & { apiKey: string | null }
>;

export type PromptConfig = Readonly<FileConfig["summarizer"]["prompt"]>;

export type SourcesConfig = Readonly<{
  concurrency: number;
  rss: Readonly<{
    feeds: ReadonlyArray<RssFeedConfig>;
    maxItemsPerFeed: number;
    timeoutMs: number;
  }>;
  newsApi: Readonly<{
    endpoint: string;
    queries: ReadonlyArray<NewsApiQuery>;
    timeoutMs: number;
    apiKey: string | null;
  }>;
}>;

export type SummarizerConfig = Readonly<{
  timeoutMs: number;
  maxOutputTokens: number;
  prompt: PromptConfig;
  providers: ReadonlyArray<ProviderConfig>;
}>;

export type SmtpConfig = Readonly<{
  host: string;
  port: number;
  user: string | null;
  password: string | null;
}>;

export type DeliveryConfig = Readonly<{
  subject: string;
  from: string | null;
  to: string | null;
  smtp: SmtpConfig;
}>;

/**
 * The assembled, immutable run configuration: file settings with every
 * credential already resolved from the environment.
 */
export type AppConfig = Readonly<{
  sources: SourcesConfig;
  summarizer: SummarizerConfig;
  delivery: DeliveryConfig;
}>;
