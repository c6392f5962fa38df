#!/usr/bin/env node
/**
 * cmdcomplete CLI Entry Point
 */

import { runCli } from './cli/run.js';

process.exitCode = runCli(process.argv);
