#!/usr/bin/env node

/**
 * CLI for the pricing agent
 * Run a pricing query locally, outside the agent framework
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
