import type { OutputFormat, PipelineHandlers } from '../../types.js';
import { writeRecord, writeSkip } from '../../util/output.js';

export function createDefaultHandlers(format: OutputFormat): PipelineHandlers {
  return {
    onRecord: (record) => writeRecord(record, format),
    onSkip: (event) => writeSkip(event, format),
  };
}
