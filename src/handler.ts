/**
 * Invocation entry point for the agent framework
 */

import { createHandler } from './execution-handler.js';

export const handler = createHandler();
