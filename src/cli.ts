#!/usr/bin/env node

/**
 * repo-snapshot CLI
 *
 * Walk a directory and write one Markdown snapshot of it for LLM context.
 */

import { createProgram } from './program.js';

createProgram().parse();
