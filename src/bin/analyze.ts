#!/usr/bin/env node
import { OutputSink, runAnalysis } from '../cli';
import { loadConfig } from '../config';
import { Logger } from '../utils/logger';

/**
 * Entry point: analyze ./model.safetensors and set the process exit code.
 */
export async function main(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  out: OutputSink = process.stdout,
): Promise<number> {
  const config = loadConfig(env, cwd);
  Logger.initialize({ verbose: config.verbose });
  const code = await runAnalysis(config, out);
  process.exitCode = code;
  return code;
}

if (require.main === module) {
  main().catch((err: unknown) => {
    Logger.error('Fatal error', err);
    process.exitCode = 1;
  });
}
