import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import type { RestaurantRecord } from '../types';

export const TSV_COLUMNS: Array<keyof RestaurantRecord> = ['name', 'description', 'source', 'source_url', 'address'];

export function toTsv(records: RestaurantRecord[]): string {
  return stringify(records, { header: true, delimiter: '\t', columns: TSV_COLUMNS });
}

/** Write records to `outputPath`, creating parent directories. */
export async function saveToTsv(records: RestaurantRecord[], outputPath: string): Promise<string> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, toTsv(records), 'utf8');
  return outputPath;
}
