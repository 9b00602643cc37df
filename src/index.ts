#!/usr/bin/env node
import { runCli } from './cli/data-lake-command.js';

void runCli(process.argv);
