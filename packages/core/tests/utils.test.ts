import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  PersistedStateCorruptError,
  RenderingFailureError,
  TimeoutError,
  UpstreamServiceError,
  WorksheetBotError,
  formatFileTimestamp,
  formatLongDate,
  MAX_TIMEOUT_MS,
  withTimeout
} from '../src/index';

describe('dates', () => {
  it('formats the long date line', () => {
    expect(formatLongDate(new Date(2026, 9, 19, 9, 5, 3))).toBe('Monday, October 19, 2026');
  });

  it('pads single-digit days in the long date line', () => {
    expect(formatLongDate(new Date(2026, 0, 5))).toBe('Monday, January 05, 2026');
  });

  it('formats file timestamps in local time', () => {
    expect(formatFileTimestamp(new Date(2026, 9, 19, 9, 5, 3))).toBe('20261019_090503');
  });
});

describe('withTimeout', () => {
  it('resolves with the inner value', async () => {
    await expect(withTimeout({ label: 'llm', timeoutMs: 1_000, run: async () => 'ok' })).resolves.toBe('ok');
  });

  it('rejects with TimeoutError when the call hangs', async () => {
    const pending = withTimeout({
      label: 'llm',
      timeoutMs: 5,
      run: () => new Promise<string>(() => undefined)
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('llm timed out after 5ms');
  });

  it('aborts the signal handed to the call when time runs out', async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout({
      label: 'llm',
      timeoutMs: 5,
      run: (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      }
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TimeoutError);
  });

  it('leaves the signal alone when the call settles in time', async () => {
    let seen: AbortSignal | undefined;
    await withTimeout({
      label: 'llm',
      timeoutMs: 1_000,
      run: async (signal) => {
        seen = signal;
        return 'ok';
      }
    });

    expect(seen?.aborted).toBe(false);
  });

  it('rejects delays the timer cannot represent', async () => {
    await expect(withTimeout({ label: 'llm', timeoutMs: MAX_TIMEOUT_MS + 1, run: async () => 'ok' }))
      .rejects.toBeInstanceOf(RangeError);
    await expect(withTimeout({ label: 'llm', timeoutMs: 0, run: async () => 'ok' }))
      .rejects.toBeInstanceOf(RangeError);
  });
});

describe('errors', () => {
  it('carries a code and the concrete class name', () => {
    const error = new PersistedStateCorruptError('s1', 's1_history.json', 'not JSON');

    expect(error).toBeInstanceOf(WorksheetBotError);
    expect(error.code).toBe('PERSISTED_STATE_CORRUPT');
    expect(error.name).toBe('PersistedStateCorruptError');
    expect(error.message).toBe('Persisted history for session "s1" at s1_history.json is corrupt: not JSON');
  });

  it('wraps unknown failures once', () => {
    const cause = new Error('socket hang up');
    const wrapped = UpstreamServiceError.from('llm', cause);

    expect(wrapped.service).toBe('llm');
    expect(wrapped.reason).toBe('socket hang up');
    expect(wrapped.cause).toBe(cause);
    expect(UpstreamServiceError.from('llm', wrapped)).toBe(wrapped);
  });

  it('describes non-error rejections', () => {
    expect(RenderingFailureError.from('pdf', 'boom').message).toBe('Failed to render pdf worksheet: boom');
  });

  it('lists every config issue', () => {
    expect(new ConfigError(['a: bad', 'b: missing']).message).toBe('Invalid config: a: bad; b: missing');
  });
});
