#!/usr/bin/env node

/**
 * smartmemo-setup CLI - database setup for the Smart Memo API
 *
 * Usage:
 *   smartmemo-setup                 Prompt for a backend and run the setup
 *   smartmemo-setup --backend 2     Use the SQLite backend without prompting
 */

import { runCli } from "./app.js";

await runCli();
