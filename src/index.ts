#!/usr/bin/env node
import { main } from './core/cli.js';

process.exitCode = await main(process.argv.slice(2));
