#!/usr/bin/env node

import { EXIT_RUNTIME_ERROR } from './constants.js';
import { isExecutedAsScript, runCliEntrypoint } from './entrypoint.js';
import { toErrorMessage } from './io.js';

export { isExecutedAsScript, runCliEntrypoint };

if (isExecutedAsScript(process.argv[1], import.meta.url)) {
  runCliEntrypoint().catch((error: unknown) => {
    console.error(`Fatal error: ${toErrorMessage(error)}`);
    process.exit(EXIT_RUNTIME_ERROR);
  });
}
