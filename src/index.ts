#!/usr/bin/env node
import 'dotenv/config';
import process from 'node:process';
import { runCli } from './cli';
import { logger } from './logger';
import { ExitCode } from './orchestrator';

// Exit code is set rather than forced so log streams flush before the process ends
runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Unexpected error');
    process.exitCode = ExitCode.Unexpected;
  });
