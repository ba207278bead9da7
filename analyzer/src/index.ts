import { ENV } from './config/env';
import { EXIT } from './core/cli';
import { run } from './core/runner';
import { describeError } from './utils/errors';
import { Logger } from './utils/logger';

run(process.argv.slice(2), ENV)
  .then(code => process.exit(code))
  .catch(err => {
    Logger.error('Fatal Error', describeError(err));
    process.exit(EXIT.FATAL);
  });
