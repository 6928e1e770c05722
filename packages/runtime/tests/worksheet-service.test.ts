import { describe, expect, it } from 'vitest';
import { HtmlWorksheetRenderer, OpenAILLMProvider } from '@worksheetbot/adapters';
import {
  PersistedStateCorruptError,
  UnknownChildError,
  type FileStoragePort,
  type LLMProvider,
  type WorksheetRenderer
} from '@worksheetbot/core';
import {
  SPACE_MATH_TEXT,
  TEST_CHILD,
  TEST_SESSION_ID,
  createFakeResources,
  type FakeResources
} from '@worksheetbot/testing';
import {
  SessionHistoryStore,
  WorksheetService,
  WorksheetTextParser,
  historyFileName,
  type WorksheetServiceDeps
} from '../src/index';

const HTML_FILE = 'landon_worksheet_20261019_090503.html';

function setup(overrides: Partial<WorksheetServiceDeps> = {}, fakes: FakeResources = createFakeResources()) {
  const history = new SessionHistoryStore({ storage: fakes.historyStorage, logger: fakes.logger });
  const service = new WorksheetService({
    llm: fakes.llm,
    history,
    parser: new WorksheetTextParser(),
    renderers: [new HtmlWorksheetRenderer()],
    output: fakes.outputStorage,
    logger: fakes.logger,
    notifier: fakes.notifier,
    clock: fakes.clock,
    ...overrides
  });
  return { fakes, history, service };
}

const savedHistory = (fakes: FakeResources): unknown =>
  JSON.parse(fakes.historyStorage.read(historyFileName(TEST_SESSION_ID)) ?? 'null');

const worksheetTurn = (request = 'rockets please') => ({ sessionId: TEST_SESSION_ID, child: TEST_CHILD, request });

describe('WorksheetService.generateWorksheet', () => {
  it('records the turn, renders, saves and sends the link', async () => {
    const { fakes, service } = setup();

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.reply).toBe(SPACE_MATH_TEXT);
    expect(result.worksheet.title).toBe('Space Math');
    expect(result.artifacts).toEqual([HTML_FILE]);
    expect(result.notified).toBe(true);

    expect(fakes.notifier.sent).toEqual([HTML_FILE]);
    expect(fakes.outputStorage.read(HTML_FILE)).toContain('<h1>Space Math</h1>');
    expect(fakes.outputStorage.read(HTML_FILE)).toContain('Date: Monday, October 19, 2026 • Created for Landon');
    expect(savedHistory(fakes)).toEqual([
      { role: 'user', content: 'rockets please' },
      { role: 'assistant', content: SPACE_MATH_TEXT }
    ]);
  });

  it('sends the child prompt and the prior turns to the model', async () => {
    const { fakes, service } = setup();

    await service.generateWorksheet(worksheetTurn('first'));
    await service.generateWorksheet(worksheetTurn('second'));

    const [firstCall, secondCall] = fakes.llm.calls;
    expect(firstCall?.systemPrompt).toContain('for Landon, age 7.');
    expect(firstCall?.systemPrompt).toContain("Today's date is Monday, October 19, 2026.");
    expect(firstCall?.messages).toEqual([{ role: 'user', content: 'first' }]);
    expect(secondCall?.messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: SPACE_MATH_TEXT },
      { role: 'user', content: 'second' }
    ]);
  });

  it('sends the configured share link instead of the file path', async () => {
    const { fakes, service } = setup({ shareLink: 'https://share.example.test/worksheets' });

    await service.generateWorksheet(worksheetTurn());

    expect(fakes.notifier.sent).toEqual(['https://share.example.test/worksheets']);
  });

  it('reports notified false without a notifier', async () => {
    const { service } = setup({ notifier: undefined });

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result).toMatchObject({ status: 'ok', notified: false, artifacts: [HTML_FILE] });
  });

  it('returns an upstream error and leaves history untouched when the model fails', async () => {
    const { fakes, history, service } = setup();
    fakes.llm.setResponses([new Error('503 Service Unavailable')]);

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result.status).toBe('upstream_error');
    if (result.status !== 'upstream_error') return;
    expect(result.error.service).toBe('llm');
    expect(result.error.reason).toBe('503 Service Unavailable');
    expect((await history.get(TEST_SESSION_ID)).length).toBe(0);
    expect(fakes.historyStorage.paths()).toEqual([]);
    expect(fakes.outputStorage.paths()).toEqual([]);
  });

  it('times out a model call that never answers', async () => {
    const hanging: LLMProvider = { complete: () => new Promise(() => undefined) };
    const { service } = setup({ llm: hanging, llmTimeoutMs: 5 });

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result.status).toBe('upstream_error');
    if (result.status !== 'upstream_error') return;
    expect(result.error.service).toBe('llm');
    expect(result.error.reason).toBe('llm completion timed out after 5ms');
  });

  it('aborts the model request it stops waiting for', async () => {
    let seen: AbortSignal | undefined;
    const hanging: LLMProvider = {
      complete: ({ signal }) => {
        seen = signal;
        return new Promise(() => undefined);
      }
    };
    const { service } = setup({ llm: hanging, llmTimeoutMs: 5 });

    await service.generateWorksheet(worksheetTurn());

    expect(seen?.aborted).toBe(true);
  });

  it('hands the model a live signal on a normal turn', async () => {
    const { fakes, service } = setup();

    await service.generateWorksheet(worksheetTurn());

    expect(fakes.llm.calls[0]?.signal?.aborted).toBe(false);
  });

  it('treats an empty completion as an upstream failure', async () => {
    const llm = new OpenAILLMProvider({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      client: { chat: { completions: { create: async () => ({ model: 'gpt-4o-mini', choices: [{ message: { content: null } }] }) } } }
    });
    const { fakes, service } = setup({ llm });

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result.status).toBe('upstream_error');
    expect(fakes.historyStorage.paths()).toEqual([]);
    expect(fakes.outputStorage.paths()).toEqual([]);
    expect(fakes.notifier.sent).toEqual([]);
  });

  it('throws a failed artifact write instead of reporting a render error', async () => {
    const fakes = createFakeResources();
    const fullDisk: FileStoragePort = {
      put: () => Promise.reject(new Error('ENOSPC: no space left on device')),
      get: (path) => fakes.outputStorage.get(path),
      exists: (path) => fakes.outputStorage.exists(path)
    };
    const { service } = setup({ output: fullDisk }, fakes);

    await expect(service.generateWorksheet(worksheetTurn())).rejects.toThrow('ENOSPC: no space left on device');
    expect(savedHistory(fakes)).toHaveLength(2);
    expect(fakes.notifier.sent).toEqual([]);
  });

  it('keeps the recorded turn and earlier artifacts when a renderer fails', async () => {
    const broken: WorksheetRenderer = {
      format: 'pdf',
      render: () => Promise.reject(new Error('font missing'))
    };
    const { fakes, service } = setup({ renderers: [new HtmlWorksheetRenderer(), broken] });

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result.status).toBe('render_error');
    if (result.status !== 'render_error') return;
    expect(result.artifacts).toEqual([HTML_FILE]);
    expect(result.error.format).toBe('pdf');
    expect(result.error.message).toBe('Failed to render pdf worksheet: font missing');
    expect(savedHistory(fakes)).toHaveLength(2);
    expect(fakes.notifier.sent).toEqual([]);
  });

  it('returns a notify error after the worksheet is saved', async () => {
    const { fakes, service } = setup();
    fakes.notifier.failWith(new Error('smtp down'));

    const result = await service.generateWorksheet(worksheetTurn());

    expect(result.status).toBe('notify_error');
    if (result.status !== 'notify_error') return;
    expect(result.error.service).toBe('mail');
    expect(result.error.reason).toBe('smtp down');
    expect(result.artifacts).toEqual([HTML_FILE]);
    expect(fakes.outputStorage.paths()).toEqual([HTML_FILE]);
  });

  it('rejects an unknown child before calling the model', async () => {
    const { fakes, service } = setup();

    await expect(service.generateWorksheet({ ...worksheetTurn(), child: 'Ava' })).rejects.toBeInstanceOf(UnknownChildError);
    expect(fakes.llm.calls).toEqual([]);
  });

  it('propagates a corrupt history', async () => {
    const fakes = createFakeResources();
    await fakes.historyStorage.put(historyFileName(TEST_SESSION_ID), '{oops');
    const { service } = setup({}, fakes);

    await expect(service.generateWorksheet(worksheetTurn())).rejects.toBeInstanceOf(PersistedStateCorruptError);
    expect(fakes.llm.calls).toEqual([]);
  });
});

describe('WorksheetService.chat', () => {
  it('answers from the model and records the turn', async () => {
    const { fakes, service } = setup({}, createFakeResources(['Pizza night sounds great.']));

    const result = await service.chat({ sessionId: TEST_SESSION_ID, request: 'dinner ideas?' });

    expect(result).toEqual({ status: 'ok', reply: 'Pizza night sounds great.' });
    expect(fakes.llm.calls[0]?.systemPrompt).not.toContain('live search');
    expect(savedHistory(fakes)).toEqual([
      { role: 'user', content: 'dinner ideas?' },
      { role: 'assistant', content: 'Pizza night sounds great.' }
    ]);
  });

  it('adds search results to the prompt when a search provider is set', async () => {
    const fakes = createFakeResources(['The Chiefs won.']);
    fakes.search.setResults([{ title: 'Chiefs', snippet: 'won 24-20' }]);
    const { service } = setup({ search: fakes.search }, fakes);

    await service.chat({ sessionId: TEST_SESSION_ID, request: 'did the chiefs win?' });

    expect(fakes.search.queries).toEqual(['did the chiefs win?']);
    expect(fakes.llm.calls[0]?.systemPrompt).toContain('- Chiefs: won 24-20');
  });

  it('returns an upstream error when search fails', async () => {
    const fakes = createFakeResources();
    fakes.search.failWith(new Error('quota exceeded'));
    const { service } = setup({ search: fakes.search }, fakes);

    const result = await service.chat({ sessionId: TEST_SESSION_ID, request: 'weather?' });

    expect(result.status).toBe('upstream_error');
    if (result.status !== 'upstream_error') return;
    expect(result.error.service).toBe('search');
    expect(result.error.reason).toBe('quota exceeded');
    expect(fakes.llm.calls).toEqual([]);
    expect(fakes.historyStorage.paths()).toEqual([]);
  });
});
