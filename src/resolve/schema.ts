import { z } from 'zod';

/**
 * Shapes of the two structured responses. Every field is optional and a
 * field of the wrong type reads as missing, so defaults can fill the gaps.
 */

const numeric = z.number().or(z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number));
const lenientNumber = numeric.optional().catch(undefined);
const lenientString = z.string().trim().min(1).optional().catch(undefined);

export const RawParametersSchema = z.object({
  tempo: lenientNumber,
  time_signature: lenientString,
  key: lenientString,
  measures: lenientNumber,
  form: z
    .union([z.string().trim().min(1), z.array(z.string()).min(1).transform(parts => parts.join('-'))])
    .optional()
    .catch(undefined),
  chord_progression: z.array(z.string().trim().min(1)).min(1).optional().catch(undefined),
  scale: lenientString,
  style: lenientString,
});

export type RawParameters = z.infer<typeof RawParametersSchema>;

export const InstrumentPairSchema = z.tuple([z.string().trim().min(1), numeric]);

export const InstrumentListSchema = z.array(z.unknown());

export const RawInstrumentationSchema = z.record(z.string(), z.unknown());
