#!/usr/bin/env node
/**
 * @fileoverview Entry point of the `string-db` command.
 * @module src/cli/index
 */
import 'reflect-metadata';

import { container } from 'tsyringe';

import { composeContainer } from '@/container/index.js';
import { StringDbService } from '@/container/tokens.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import { runCli } from './program.js';

const exitCode = await runCli(process.argv.slice(2), {
  getService: () => {
    composeContainer();
    return container.resolve<StringDbServiceClass>(StringDbService);
  },
});
process.exitCode = exitCode;
