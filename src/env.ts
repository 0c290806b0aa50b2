import { config } from 'dotenv';
import type { LogLevel } from './ports/sys/LoggerPort';
import { isLogLevel } from './adapters/sys/ConsoleLogger';

config();

export let TOOLS_DIR = process.env.TOOLS_DIR || undefined;
export let LOG_LEVEL: LogLevel | undefined = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : undefined;

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined = process.env.TOOLS_CONFIG || undefined;
let logFileArg: string | undefined = process.env.LOG_FILE || undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--tools-dir':
      if (cliArgs[i + 1]) {
        TOOLS_DIR = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--log-level': {
      const level = cliArgs[i + 1];
      if (isLogLevel(level)) {
        LOG_LEVEL = level;
        i++;
      }
      break;
    }
    case '--debug':
      LOG_LEVEL = 'debug';
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;
