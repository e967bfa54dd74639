import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { InstrumentIdentification } from '../types/market-data.types.js';
import { ValidationError } from '../utils/errors.js';
import { ISIN_LENGTH } from './constants.js';

const instrumentsSchema = z
  .array(
    z.object({
      isin: z.string().length(ISIN_LENGTH),
      tsetmcCode: z.string().regex(/^\d+$/),
      ticker: z.string().min(1),
      name: z.string().default(''),
    }),
  )
  .superRefine((instruments, ctx) => {
    const seen = new Set<string>();
    instruments.forEach((instrument, index) => {
      if (seen.has(instrument.isin)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'isin'],
          message: `Duplicate isin ${instrument.isin}`,
        });
      }
      seen.add(instrument.isin);
    });
  });

export function parseInstruments(json: unknown): InstrumentIdentification[] {
  const parsed = instrumentsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError('Invalid instrument universe', parsed.error.issues);
  }
  return parsed.data;
}

export async function loadInstruments(path: string): Promise<InstrumentIdentification[]> {
  const content = await readFile(path, 'utf8');
  return parseInstruments(JSON.parse(content));
}
