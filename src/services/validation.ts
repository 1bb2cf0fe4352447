//ingestion input contract, validation never throws: every problem maps to a reason code
import { z } from 'zod';
import { SOURCE_KINDS, type IngestReason } from '../models/index.js';
import { parseAwardDate } from './dates.js';

//collaborators send null for fields they do not have
const optionalText = () => z.string().trim().nullish().transform(v => v ?? '');

export const ObservationInputSchema = z.object({
  sourceIdentifier: optionalText(),
  itemIdentifier: optionalText(),
  description: z.string().default(''),
  unitPrice: z.number().finite().positive(),
  quantity: z.number().finite().min(1).default(1),
  supplierName: z.string().trim().nullish().transform(v => v || undefined),
  departmentOrAgency: optionalText(),
  awardDate: z.union([z.string(), z.date()]).transform((value, ctx) => {
    const parsed = parseAwardDate(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable award date: ${String(value)}` });
      return z.NEVER;
    }
    return parsed;
  }),
  sourceKind: z.enum(SOURCE_KINDS).default('live_lookup'),
}).refine(v => v.description.trim() !== '' || v.itemIdentifier !== '', {
  message: 'Either description or itemIdentifier is required',
  path: ['description'],
});

export type ObservationInput = z.input<typeof ObservationInputSchema>;
export type ValidObservation = z.output<typeof ObservationInputSchema>;

export type ValidationOutcome =
  | { ok: true; value: ValidObservation }
  | { ok: false; reason: IngestReason; message: string };

const REASON_BY_FIELD: Record<string, IngestReason> = {
  unitPrice: 'invalid_price',
  quantity: 'invalid_quantity',
  description: 'missing_description',
  awardDate: 'invalid_date',
};

export function validateObservation(input: unknown): ValidationOutcome {
  const parsed = ObservationInputSchema.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };

  const issue = parsed.error.issues[0];
  const field = issue && typeof issue.path[0] === 'string' ? issue.path[0] : '';
  return {
    ok: false,
    reason: REASON_BY_FIELD[field] ?? 'invalid_input',
    message: issue ? `${field || 'input'}: ${issue.message}` : 'Invalid observation',
  };
}
