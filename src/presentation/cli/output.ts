import { CallRecord } from '../../application/types/index';
import { logger } from '../../infrastructure/logging/Logger';
import { formatRecords, OutputFormat, toJsonLine } from './formatters';

export type ChunkWriter = (chunk: string) => void;

/**
 * Drain a record sequence into `write`, returning the number of records.
 *
 * jsonl is written record by record. json and csv need the whole set, so
 * they are buffered; if the sequence fails part way, the records received so
 * far are still written before the error is rethrown.
 */
export async function writeRecords(
  records: AsyncIterable<CallRecord>,
  format: OutputFormat,
  write: ChunkWriter
): Promise<number> {
  if (format === 'jsonl') {
    let count = 0;
    try {
      for await (const record of records) {
        write(toJsonLine(record));
        count++;
      }
    } catch (error) {
      logger.warn('Record sequence aborted', { format, written: count });
      throw error;
    }
    return count;
  }

  const buffered: CallRecord[] = [];
  try {
    for await (const record of records) {
      buffered.push(record);
    }
  } catch (error) {
    logger.warn('Record sequence aborted', { format, written: buffered.length });
    if (buffered.length > 0) {
      write(formatRecords(buffered, format));
    }
    throw error;
  }

  write(formatRecords(buffered, format));
  return buffered.length;
}
