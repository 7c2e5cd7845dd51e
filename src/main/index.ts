import { runCli } from './cli';
import { logger } from './utils/logger';
import { getErrorMessage } from './utils/errors';

runCli(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error(`Unexpected failure: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  }
);
