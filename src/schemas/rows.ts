import { z } from 'zod';

/** Column aliases resolved once at ingestion; keys are canonical names */
export const BAR_COLUMN_ALIASES: Record<string, string[]> = {
  date: ['date', 'timestamp', 'time', 'datetime', 'date_time', 'trading_date'],
  open: ['open'],
  high: ['high'],
  low: ['low'],
  close: ['close'],
  volume: ['volume', 'vol']
};

export const SIGNAL_COLUMN_ALIASES: Record<string, string[]> = {
  index: ['index', 'idx', 'bar_index'],
  date: ['date', 'timestamp', 'datetime'],
  signal_type: ['signal_type', 'type', 'side', 'signal'],
  note: ['note', 'notes']
};

const numericCell = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is empty`)
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${label} is not a number` })
        .finite(`${label} is not a number`)
    );

export const barRowSchema = z.object({
  date: z.string().trim().min(1, 'date is empty'),
  open: numericCell('open'),
  high: numericCell('high'),
  low: numericCell('low'),
  close: numericCell('close'),
  volume: numericCell('volume').pipe(z.number().nonnegative('volume must be >= 0'))
});

export const signalRowSchema = z.object({
  index: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v === undefined || v === '' ? undefined : v))
    .pipe(z.coerce.number().int('index must be an integer').optional()),
  date: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v === '' ? undefined : v)),
  signal_type: z
    .string()
    .trim()
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(['BUY', 'SELL'])),
  note: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : v))
});

export type BarRow = z.infer<typeof barRowSchema>;
export type SignalRow = z.infer<typeof signalRowSchema>;
