import { AnalyzerConfig } from './config';
import { aggregateByDtype } from './parsers/aggregator';
import { readHeader } from './parsers/headerParser';
import { formatHeaderSize, formatReport } from './report/reporter';
import { isSafetensorsError } from './utils/errors';
import { Logger } from './utils/logger';

export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Analyze the configured file and print the dtype distribution to `out`.
 * Resolves to the process exit code.
 */
export async function runAnalysis(config: AnalyzerConfig, out: OutputSink): Promise<number> {
  const println = (line: string) => out.write(`${line}\n`);

  try {
    Logger.log(`Reading ${config.filePath}`, 'read');
    const header = await readHeader(config.filePath, {
      maxHeaderSize: config.maxHeaderSize,
      onHeaderSize: (headerLength) => {
        Logger.log(`Header length ${headerLength} bytes`, 'read');
        println(formatHeaderSize(headerLength));
      },
    });

    const aggregate = aggregateByDtype(header);
    Logger.log(
      `${header.entries.length} header entries, ${aggregate.buckets.size} dtypes, ${aggregate.totalElements} elements`,
      'aggregate',
    );

    for (const line of formatReport(aggregate)) {
      println(line);
    }
    return 0;
  } catch (err) {
    if (isSafetensorsError(err)) {
      Logger.log(`Failed with ${err.code}`, 'read');
      println(err.message);
    } else {
      Logger.error(`Unexpected failure analyzing ${config.filePath}`, err);
    }
    return 1;
  }
}
