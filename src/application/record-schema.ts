import { z } from 'zod';
import { DAY_KEY } from '../domain/index.js';
import { ceilTo, floorTo } from './numeric.js';

/**
 * Event names key every map in the pipeline and are written as
 * `name:value` lines, so they cannot contain ':' or collide with the
 * day marker.
 */
export const eventNameSchema = z
  .string()
  .trim()
  .min(1, 'Event name must not be empty')
  .refine((name) => !name.includes(':'), { message: "Event name must not contain ':'" })
  .refine((name) => name !== DAY_KEY, { message: `"${DAY_KEY}" is reserved for day markers` });

/** Zod schema for one catalog record once its numeric fields are parsed. */
export const eventDefinitionSchema = z
  .object({
    name: eventNameSchema,
    kind: z.enum(['continuous', 'discrete']),
    min: z.number().finite(),
    max: z.number().finite(),
    weight: z.number().int('Weight must be an integer').min(1, 'Non-zero positive integer expected for weight'),
  })
  .refine((d) => d.min < d.max, { message: 'min value expected to be lower than max value', path: ['min'] })
  .refine((d) => d.kind !== 'discrete' || Math.ceil(d.min) <= Math.floor(d.max), {
    message: 'Discrete event range must contain at least one integer',
    path: ['max'],
  })
  .refine((d) => d.kind !== 'continuous' || ceilTo(d.min, 2) <= floorTo(d.max, 2), {
    message: 'Continuous event range must contain at least one 2-decimal value',
    path: ['max'],
  });

/** Zod schema for one statistics record. */
export const eventStatisticSchema = z.object({
  name: eventNameSchema,
  mean: z.number().finite(),
  stddev: z.number().finite().min(0, 'Standard deviation must not be negative'),
});
