import { type RenderFormat } from '../errors';
import { type LogLevel } from '../ports/logger';

export interface LLMConfig {
  apiKey?    : string;
  model      : string;
  baseUrl    : string;
  timeoutMs  : number;
  maxRetries : number;
}

export interface MailConfig {
  host       : string;
  port       : number;
  secure     : boolean;
  user?      : string;
  pass?      : string;
  from       : string;
  recipients : string[];
}

export interface AppConfig {
  llm              : LLMConfig;
  historyDir       : string;
  historyRetention : number;
  sessionId        : string;
  outputDir        : string;
  formats          : RenderFormat[];
  /** Link sent by mail after each worksheet; falls back to the first artifact path. */
  shareLink?       : string;
  /** Mail is off when this is absent. */
  mail?            : MailConfig;
  logLevel         : LogLevel;
  prettyLogs       : boolean;
}
