import {
  ConfigError,
  type AppConfig,
  type FileStoragePort,
  type LLMProvider,
  type Logger,
  type Notifier,
  type RenderFormat,
  type SearchProvider,
  type WorksheetRenderer
} from '@worksheetbot/core';
import {
  HtmlWorksheetRenderer,
  LocalFileStorage,
  OpenAILLMProvider,
  PdfWorksheetRenderer,
  PinoLogger,
  SmtpNotifier
} from '@worksheetbot/adapters';
import { SessionHistoryStore } from './history/sessionHistoryStore';
import { collectLifecycleResources, closeResources, startResources } from './resources/lifecycle';
import { WorksheetService } from './service/worksheetService';
import { WorksheetTextParser } from './worksheet/worksheetTextParser';

/** Anything left out is built from config. */
export interface WorksheetBotProviders {
  llm?            : LLMProvider;
  historyStorage? : FileStoragePort;
  outputStorage?  : FileStoragePort;
  renderers?      : WorksheetRenderer[];
  /** `null` turns mail off even when config has it. */
  notifier?       : Notifier | null;
  search?         : SearchProvider;
  logger?         : Logger;
  clock?          : () => Date;
}

export interface WorksheetBot {
  readonly config  : AppConfig;
  readonly logger  : Logger;
  readonly history : SessionHistoryStore;
  readonly service : WorksheetService;
  start(): Promise<void>;
  close(): Promise<void>;
}

const RENDERERS: Record<RenderFormat, () => WorksheetRenderer> = {
  html: () => new HtmlWorksheetRenderer(),
  pdf: () => new PdfWorksheetRenderer()
};

function createLLM(config: AppConfig): LLMProvider {
  const { apiKey, model, baseUrl, maxRetries } = config.llm;
  if (!apiKey) {
    throw new ConfigError(['OPENAI_API_KEY: required for the OpenAI provider']);
  }
  return new OpenAILLMProvider({ apiKey, model, baseUrl, maxRetries });
}

function createNotifier(config: AppConfig, logger: Logger, provided: Notifier | null | undefined): Notifier | undefined {
  if (provided !== undefined) return provided ?? undefined;
  if (!config.mail) return undefined;
  return new SmtpNotifier({ mail: config.mail, logger: logger.child({ component: 'smtp-notifier' }) });
}

/**
 * Wires the history store, parser, renderers and adapters into one
 * `WorksheetService`. The store is created here, once, and shared by every
 * caller of this bot.
 */
export function createWorksheetBot(config: AppConfig, providers: WorksheetBotProviders = {}): WorksheetBot {
  const logger = providers.logger ?? new PinoLogger({
    level: config.logLevel,
    prettyPrint: config.prettyLogs,
    name: 'worksheetbot'
  });

  const llm = providers.llm ?? createLLM(config);
  const historyStorage = providers.historyStorage ?? new LocalFileStorage(config.historyDir);
  const outputStorage = providers.outputStorage ?? new LocalFileStorage(config.outputDir);
  const notifier = createNotifier(config, logger, providers.notifier);

  const history = new SessionHistoryStore({
    storage: historyStorage,
    retention: config.historyRetention,
    logger
  });

  const service = new WorksheetService({
    llm,
    history,
    parser: new WorksheetTextParser({ logger }),
    renderers: providers.renderers ?? config.formats.map((format) => RENDERERS[format]()),
    output: outputStorage,
    logger,
    ...(notifier && { notifier }),
    ...(providers.search && { search: providers.search }),
    ...(config.shareLink !== undefined && { shareLink: config.shareLink }),
    ...(providers.clock && { clock: providers.clock }),
    llmTimeoutMs: config.llm.timeoutMs
  });

  const resources = collectLifecycleResources([historyStorage, outputStorage, llm, providers.search, notifier]);

  return {
    config,
    logger,
    history,
    service,
    async start() {
      await startResources(resources);
      logger.info({ formats: config.formats, mail: notifier !== undefined }, 'worksheetbot started');
    },
    async close() {
      await closeResources(resources);
    }
  };
}
