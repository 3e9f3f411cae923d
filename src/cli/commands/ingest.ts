/**
 * `vitalsense ingest <file>`: load metrics and check-ins from a JSON export
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError, toError } from '../../core/errors.js';
import { isIsoDate } from '../../utils/dates.js';
import { withSession, type GlobalOptions } from '../bootstrap.js';

const IsoDate = z.string().refine(isIsoDate, 'expected YYYY-MM-DD');

export const IngestFileSchema = z.object({
  metrics: z.record(
    z.string(),
    z.array(z.object({ date: IsoDate, value: z.number().nullable() })),
  ).default({}),
  checkIns: z.array(z.object({
    date: IsoDate,
    time: z.string().regex(/^\d{2}:\d{2}$/),
    level: z.number().int().min(1).max(5),
  })).default([]),
});

export type IngestFile = z.infer<typeof IngestFileSchema>;

export function parseIngestFile(text: string, path: string): IngestFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${path} is not valid JSON: ${toError(err).message}`, toError(err));
  }
  const parsed = IngestFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`${path} has invalid entries: ${issues}`, parsed.error);
  }
  return parsed.data;
}

export function createIngestCommand(): Command {
  const cmd = new Command('ingest');

  cmd
    .description('Import daily metrics and energy check-ins from a JSON file')
    .argument('<file>', 'JSON file: { "metrics": { "<name>": [{ "date", "value" }] }, "checkIns": [...] }')
    .action(async (file: string, _options: Record<string, unknown>, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const data = parseIngestFile(readFileSync(file, 'utf-8'), file);

      await withSession(globals, async ({ runtime }) => {
        let points = 0;
        for (const [metric, series] of Object.entries(data.metrics)) {
          await runtime.store.putMetricValues(metric, series);
          points += series.length;
        }
        for (const checkIn of data.checkIns) {
          await runtime.store.putCheckIn(checkIn);
        }
        console.log(
          `  Imported ${points} readings across ${Object.keys(data.metrics).length} metrics, ` +
          `${data.checkIns.length} check-ins`,
        );
      });
    });

  return cmd;
}
