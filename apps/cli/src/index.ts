#!/usr/bin/env node
import { createConsoleLogger } from '@pagemark/logger';
import { PdfTextExtractor } from '@pagemark/pdf-parser';

import { parseArguments, runCli } from './cli';

const argv = process.argv.slice(2);
const logger = createConsoleLogger({
  verbose: parseArguments(argv)?.verbose ?? false,
});

process.exitCode = await runCli(argv, {
  logger,
  extractor: new PdfTextExtractor(logger),
});
