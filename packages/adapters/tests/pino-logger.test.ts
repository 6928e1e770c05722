import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { PinoLogger } from '../src/index';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const instance = pino({ level: 'debug', base: null, timestamp: false }, {
    write(chunk: string) {
      const entry: Record<string, unknown> = JSON.parse(chunk);
      lines.push(entry);
    }
  });
  return { lines, logger: new PinoLogger(instance) };
}

describe('PinoLogger', () => {
  it('writes structured fields and messages', () => {
    const { lines, logger } = capture();

    logger.info({ sessionId: 's1' }, 'history saved');
    logger.debug('bare message');
    logger.trace('below level');

    expect(lines).toEqual([
      { level: 30, sessionId: 's1', msg: 'history saved' },
      { level: 20, msg: 'bare message' }
    ]);
  });

  it('binds child context', () => {
    const { lines, logger } = capture();

    logger.child({ component: 'parser' }).warn({ dropped: 2 }, 'lines outside a section');

    expect(lines).toEqual([{ level: 40, component: 'parser', dropped: 2, msg: 'lines outside a section' }]);
  });
});
