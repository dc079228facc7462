#!/usr/bin/env node
import 'dotenv/config'; // Load .env file into process.env

import { bootstrapLogger, applyLoggerConfig, log, LogLevel } from './logger';
import { loadConfig } from './configLoader';
import { runCli } from './cli';

async function main(): Promise<number> {
  bootstrapLogger();
  const config = loadConfig();
  applyLoggerConfig(config.logging);

  return runCli(process.argv.slice(2), {
    config,
    write: (text) => process.stdout.write(text),
  });
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    log(LogLevel.ERROR, 'Fatal error during startup:', error);
    process.exitCode = 1;
  });
