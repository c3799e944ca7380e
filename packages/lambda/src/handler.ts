import { loadImportEnv } from './config/env.js';
import { createHandler } from './createHandler.js';

/** Lambda entry point. A missing or invalid setting fails the cold start. */
export const handler = createHandler({ env: loadImportEnv(process.env) });
