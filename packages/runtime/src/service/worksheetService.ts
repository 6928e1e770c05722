import {
  LLM_DEFAULTS,
  RenderingFailureError,
  UpstreamServiceError,
  assistantMessage,
  countQuestions,
  formatFileTimestamp,
  formatLongDate,
  userMessage,
  withTimeout,
  type FileStoragePort,
  type LLMProvider,
  type Logger,
  type Notifier,
  type RenderedDocument,
  type SearchProvider,
  type SessionHistory,
  type WorksheetMeta,
  type WorksheetRecord,
  type WorksheetRenderer
} from '@worksheetbot/core';
import { type SessionHistoryStore } from '../history/sessionHistoryStore';
import { findChildProfile } from '../prompts/children';
import { buildChatPrompt, buildWorksheetPrompt, formatSearchResults } from '../prompts/templates';
import { type WorksheetTextParser } from '../worksheet/worksheetTextParser';

export interface WorksheetServiceDeps {
  llm          : LLMProvider;
  history      : SessionHistoryStore;
  parser       : WorksheetTextParser;
  /** Rendered in order; each artifact is written to `output`. */
  renderers    : WorksheetRenderer[];
  output       : FileStoragePort;
  logger       : Logger;
  notifier?    : Notifier;
  search?      : SearchProvider;
  /** Sent instead of the first artifact path when set. */
  shareLink?   : string;
  llmTimeoutMs?: number;
  clock?       : () => Date;
}

export interface WorksheetRequest {
  sessionId : string;
  child     : string;
  request   : string;
}

export interface ChatRequest {
  sessionId : string;
  request   : string;
}

export type WorksheetTurnResult =
  | { status: 'ok'; reply: string; worksheet: WorksheetRecord; artifacts: string[]; notified: boolean }
  | { status: 'upstream_error'; error: UpstreamServiceError }
  | { status: 'render_error'; reply: string; worksheet: WorksheetRecord; artifacts: string[]; error: RenderingFailureError }
  | { status: 'notify_error'; reply: string; worksheet: WorksheetRecord; artifacts: string[]; error: UpstreamServiceError };

export type ChatTurnResult =
  | { status: 'ok'; reply: string }
  | { status: 'upstream_error'; error: UpstreamServiceError };

const SEARCH_LIMIT = 5;

/**
 * Runs one worksheet or chat turn to completion: history, model call, parse,
 * render, notify. Upstream, rendering and notification failures come back as
 * result variants; history corruption, artifact write failures and unknown
 * children are thrown.
 *
 * Turns for the same session must not overlap.
 */
export class WorksheetService {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly llmTimeoutMs: number;

  public constructor(private readonly deps: WorksheetServiceDeps) {
    this.logger = deps.logger.child({ component: 'worksheet-service' });
    this.clock = deps.clock ?? (() => new Date());
    this.llmTimeoutMs = deps.llmTimeoutMs ?? LLM_DEFAULTS.TIMEOUT_MS;
  }

  public async generateWorksheet(input: WorksheetRequest): Promise<WorksheetTurnResult> {
    const child = findChildProfile(input.child);
    const now = this.clock();
    const meta: WorksheetMeta = { child: child.name, date: formatLongDate(now) };

    const history = await this.deps.history.get(input.sessionId);
    const reply = await this.complete(history, buildWorksheetPrompt(child, meta.date), input.request);
    if (reply instanceof UpstreamServiceError) {
      return { status: 'upstream_error', error: reply };
    }
    await this.recordTurn(history, input.request, reply);

    const worksheet = this.deps.parser.parse(reply, child.name);
    const artifacts: string[] = [];
    const baseName = `${child.name.toLowerCase()}_worksheet_${formatFileTimestamp(now)}`;

    for (const renderer of this.deps.renderers) {
      let document: RenderedDocument;
      try {
        document = await renderer.render(worksheet, meta);
      } catch (error) {
        const failure = RenderingFailureError.from(renderer.format, error);
        this.logger.error({ sessionId: input.sessionId, format: renderer.format, err: failure }, 'worksheet rendering failed');
        return { status: 'render_error', reply, worksheet, artifacts, error: failure };
      }
      // A failed write is thrown, not reported as a render_error.
      artifacts.push(await this.deps.output.put(`${baseName}.${document.extension}`, document.content));
    }

    this.logger.info(
      { sessionId: input.sessionId, child: child.name, questions: countQuestions(worksheet), artifacts },
      'worksheet generated'
    );

    const link = this.deps.shareLink ?? artifacts[0];
    if (!this.deps.notifier || link === undefined) {
      return { status: 'ok', reply, worksheet, artifacts, notified: false };
    }

    try {
      await this.deps.notifier.notify(link);
    } catch (error) {
      const failure = UpstreamServiceError.from('mail', error);
      this.logger.warn({ sessionId: input.sessionId, err: failure }, 'worksheet link not sent');
      return { status: 'notify_error', reply, worksheet, artifacts, error: failure };
    }

    return { status: 'ok', reply, worksheet, artifacts, notified: true };
  }

  public async chat(input: ChatRequest): Promise<ChatTurnResult> {
    const history = await this.deps.history.get(input.sessionId);

    let lookup: string | undefined;
    if (this.deps.search) {
      try {
        lookup = formatSearchResults(await this.deps.search.search(input.request, { limit: SEARCH_LIMIT }), SEARCH_LIMIT);
      } catch (error) {
        const failure = UpstreamServiceError.from('search', error);
        this.logger.warn({ sessionId: input.sessionId, err: failure }, 'lookup failed');
        return { status: 'upstream_error', error: failure };
      }
    }

    const reply = await this.complete(history, buildChatPrompt(formatLongDate(this.clock()), lookup), input.request);
    if (reply instanceof UpstreamServiceError) {
      return { status: 'upstream_error', error: reply };
    }
    await this.recordTurn(history, input.request, reply);

    return { status: 'ok', reply };
  }

  private async complete(
    history: SessionHistory,
    systemPrompt: string,
    request: string
  ): Promise<string | UpstreamServiceError> {
    try {
      const response = await withTimeout({
        label: 'llm completion',
        timeoutMs: this.llmTimeoutMs,
        run: (signal) => this.deps.llm.complete({
          systemPrompt,
          messages: [...history.messages, userMessage(request)],
          signal
        })
      });
      this.logger.debug(
        { sessionId: history.sessionId, model: response.model, latencyMs: response.latencyMs, ...response.tokensUsed },
        'llm completed'
      );
      return response.content;
    } catch (error) {
      const failure = UpstreamServiceError.from('llm', error);
      this.logger.warn({ sessionId: history.sessionId, err: failure }, 'llm call failed');
      return failure;
    }
  }

  private async recordTurn(history: SessionHistory, request: string, reply: string): Promise<void> {
    await this.deps.history.append(history.sessionId, userMessage(request));
    await this.deps.history.append(history.sessionId, assistantMessage(reply));
    await this.deps.history.save(history.sessionId);
  }
}
