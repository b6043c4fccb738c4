#!/usr/bin/env node

import { createProgram } from '../cli';
import { Logger } from '../utils/logger';

createProgram().parseAsync(process.argv).catch(error => {
  Logger.create('cli').error('Command failed', error);
  console.error('Command failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
