#!/usr/bin/env node
import { main } from './cli.js';

process.exitCode = main(process.env, process.argv.slice(2));
