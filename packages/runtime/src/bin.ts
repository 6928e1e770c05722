import { describeError } from '@worksheetbot/core';
import { runCli } from './cli/main';

runCli().catch((error: unknown) => {
  console.error(`worksheetbot: ${describeError(error)}`);
  process.exitCode = 1;
});
