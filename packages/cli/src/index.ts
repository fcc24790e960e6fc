#!/usr/bin/env node
// packages/cli/src/index.ts
/**
 * chanctl: operator CLI for the channel catalogue.
 *
 *   chanctl channels put news --file news.json
 *   chanctl channels put news --file news.json --if-match <etag>
 *   chanctl channels list
 *   chanctl channels get news
 *   chanctl channels delete news
 *   chanctl hash '{"x":1}'
 *   chanctl trace-id --count 3
 *
 * Data lives in `.chankv/channels.json` under the nearest directory holding
 * `.chankv/config.json` (or CHANKV_HOME / --home).
 */

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2), { env: process.env });
