import * as path from 'path';

/** The analyzed file is always this name in the working directory. */
export const MODEL_FILE_NAME = 'model.safetensors';

export const MAX_HEADER_SIZE = 100 * 1024 * 1024; // 100 MB DoS guard

export const VERBOSE_ENV_VAR = 'SAFETENSORS_STATS_VERBOSE';

export interface AnalyzerConfig {
  filePath: string;
  maxHeaderSize: number;
  verbose: boolean;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AnalyzerConfig {
  const flag = env[VERBOSE_ENV_VAR]?.toLowerCase();
  return {
    filePath: path.join(cwd, MODEL_FILE_NAME),
    maxHeaderSize: MAX_HEADER_SIZE,
    verbose: flag === '1' || flag === 'true',
  };
}
