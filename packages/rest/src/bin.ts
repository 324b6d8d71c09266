import { consoleLogger, toError } from '@batchline/core';

import { main } from './main';

main().catch((error: unknown) => {
  consoleLogger.error(`Failed to start: ${toError(error).message}`, { error });
  process.exitCode = 1;
});
