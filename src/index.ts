#!/usr/bin/env node
// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { run } from './cli/run.js';

process.exitCode = run(process.argv.slice(2));
