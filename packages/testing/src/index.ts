import {
  FakeFileStorage,
  FakeLLMProvider,
  FakeLogger,
  FakeNotifier,
  FakeSearchProvider,
  fakeLLMResponse,
} from "@worksheetbot/adapters";
import {
  HISTORY_DEFAULTS,
  LLM_DEFAULTS,
  LOGGING_DEFAULTS,
  type AppConfig,
} from "@worksheetbot/core";

export {
  FakeFileStorage,
  FakeLLMProvider,
  FakeLogger,
  FakeNotifier,
  FakeSearchProvider,
  fakeLLMResponse,
};

export const TEST_SESSION_ID = "test_session";
export const TEST_CHILD = "Landon";

/** Monday, October 19, 2026 at 09:05:03 local time. */
export const TEST_NOW = new Date(2026, 9, 19, 9, 5, 3);

export const SPACE_MATH_TEXT = [
  "TITLE: Space Math",
  "PART A",
  "1. Count 3 rockets",
  "2. Add 2+2",
  "PARENT TIPS: Go slow",
].join("\n");

export function createFakeConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    llm: {
      apiKey: "test-key",
      model: "fake-model",
      baseUrl: LLM_DEFAULTS.BASE_URL,
      timeoutMs: 1_000,
      maxRetries: 0,
    },
    historyDir: "./unused/history",
    historyRetention: HISTORY_DEFAULTS.RETENTION,
    sessionId: TEST_SESSION_ID,
    outputDir: "./unused/worksheets",
    formats: ["html"],
    logLevel: LOGGING_DEFAULTS.LEVEL,
    prettyLogs: false,
    ...overrides,
  };
}

export interface FakeResources {
  llm: FakeLLMProvider;
  historyStorage: FakeFileStorage;
  outputStorage: FakeFileStorage;
  notifier: FakeNotifier;
  search: FakeSearchProvider;
  logger: FakeLogger;
  clock: () => Date;
}

export function createFakeResources(llmResponses: string[] = [SPACE_MATH_TEXT]): FakeResources {
  return {
    llm: new FakeLLMProvider(llmResponses.map((content) => fakeLLMResponse(content))),
    historyStorage: new FakeFileStorage(),
    outputStorage: new FakeFileStorage(),
    notifier: new FakeNotifier(),
    search: new FakeSearchProvider(),
    logger: new FakeLogger(),
    clock: () => TEST_NOW,
  };
}
