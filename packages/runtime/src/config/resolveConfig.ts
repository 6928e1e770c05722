import { z } from 'zod';
import {
  ConfigError,
  HISTORY_DEFAULTS,
  LLM_DEFAULTS,
  LOGGING_DEFAULTS,
  MAIL_DEFAULTS,
  MAX_TIMEOUT_MS,
  WORKSHEET_DEFAULTS,
  type AppConfig,
  type MailConfig
} from '@worksheetbot/core';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  optionalText.pipe(z.coerce.number().int().positive().max(max).optional()).transform((value) => value ?? fallback);

const nonNegativeInt = (fallback: number) =>
  optionalText.pipe(z.coerce.number().int().nonnegative().optional()).transform((value) => value ?? fallback);

const bool = (fallback: boolean) =>
  optionalText.pipe(z.enum(['true', 'false', '1', '0']).optional())
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const list = optionalText.transform((value) =>
  (value ?? '').split(',').map((item) => item.trim()).filter((item) => item.length > 0)
);

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText.transform((value) => value ?? LLM_DEFAULTS.MODEL),
  OPENAI_BASE_URL: optionalText.pipe(z.string().url().optional()).transform((value) => value ?? LLM_DEFAULTS.BASE_URL),
  LLM_TIMEOUT_MS: positiveInt(LLM_DEFAULTS.TIMEOUT_MS, MAX_TIMEOUT_MS),
  LLM_MAX_RETRIES: nonNegativeInt(LLM_DEFAULTS.MAX_RETRIES),

  HISTORY_DIR: optionalText.transform((value) => value ?? HISTORY_DEFAULTS.DIR),
  HISTORY_RETENTION: positiveInt(HISTORY_DEFAULTS.RETENTION),
  SESSION_ID: optionalText.transform((value) => value ?? HISTORY_DEFAULTS.SESSION_ID),

  WORKSHEET_OUTPUT_DIR: optionalText.transform((value) => value ?? WORKSHEET_DEFAULTS.OUTPUT_DIR),
  WORKSHEET_FORMATS: list
    .pipe(z.array(z.enum(['html', 'pdf'])))
    .transform((formats) => (formats.length > 0 ? [...new Set(formats)] : [...WORKSHEET_DEFAULTS.FORMATS])),
  WORKSHEET_SHARE_LINK: optionalText.pipe(z.string().url().optional()),

  SMTP_HOST: optionalText,
  SMTP_PORT: positiveInt(MAIL_DEFAULTS.PORT),
  SMTP_SECURE: bool(MAIL_DEFAULTS.SECURE),
  SMTP_USER: optionalText,
  SMTP_PASS: optionalText,
  MAIL_FROM: optionalText,
  MAIL_RECIPIENTS: list.pipe(z.array(z.string().email())),

  LOG_LEVEL: optionalText
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional())
    .transform((value) => value ?? LOGGING_DEFAULTS.LEVEL),
  NODE_ENV: optionalText
});

type ParsedEnv = z.infer<typeof EnvSchema>;

function resolveMail(env: ParsedEnv, issues: string[]): MailConfig | undefined {
  if (!env.SMTP_HOST && env.MAIL_RECIPIENTS.length === 0) {
    return undefined;
  }
  if (!env.SMTP_HOST) {
    issues.push('SMTP_HOST: required when MAIL_RECIPIENTS is set');
    return undefined;
  }
  if (env.MAIL_RECIPIENTS.length === 0) {
    issues.push('MAIL_RECIPIENTS: required when SMTP_HOST is set');
    return undefined;
  }

  const from = env.MAIL_FROM ?? env.SMTP_USER;
  if (!from) {
    issues.push('MAIL_FROM: required when SMTP_USER is not set');
    return undefined;
  }

  const mail: MailConfig = {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    from,
    recipients: env.MAIL_RECIPIENTS
  };
  if (env.SMTP_USER !== undefined) mail.user = env.SMTP_USER;
  if (env.SMTP_PASS !== undefined) mail.pass = env.SMTP_PASS;
  return mail;
}

/**
 * Builds the app config from environment variables, applying defaults.
 * Collects every problem before throwing a single `ConfigError`.
 */
export function resolveConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const issues: string[] = [];
  const values = parsed.data;
  const mail = resolveMail(values, issues);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const config: AppConfig = {
    llm: {
      model: values.OPENAI_MODEL,
      baseUrl: values.OPENAI_BASE_URL,
      timeoutMs: values.LLM_TIMEOUT_MS,
      maxRetries: values.LLM_MAX_RETRIES
    },
    historyDir: values.HISTORY_DIR,
    historyRetention: values.HISTORY_RETENTION,
    sessionId: values.SESSION_ID,
    outputDir: values.WORKSHEET_OUTPUT_DIR,
    formats: values.WORKSHEET_FORMATS,
    logLevel: values.LOG_LEVEL,
    prettyLogs: values.NODE_ENV !== 'production'
  };

  if (values.OPENAI_API_KEY !== undefined) config.llm.apiKey = values.OPENAI_API_KEY;
  if (values.WORKSHEET_SHARE_LINK !== undefined) config.shareLink = values.WORKSHEET_SHARE_LINK;
  if (mail) config.mail = mail;

  return config;
}
