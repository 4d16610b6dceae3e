import * as dotenv from 'dotenv';

import { loadConfig } from './config';
import { createFlowRuntime, FlowRuntime, RuntimeOverrides } from './runtime';

/**
 * Load `.env` (or `envFile`) into the process environment, then build the
 * runtime from it. Variables already set in the environment win.
 */
export async function bootstrap(
  options: { envFile?: string; overrides?: RuntimeOverrides } = {}
): Promise<FlowRuntime> {
  dotenv.config({ path: options.envFile });
  return createFlowRuntime(loadConfig(process.env), options.overrides);
}
