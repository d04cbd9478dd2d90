#!/usr/bin/env node
import { runCli } from './Modules/App/Commands.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
