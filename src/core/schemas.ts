/**
 * Zod schemas for the project configuration file and command-line options.
 *
 * Commander hands every option value over as a string (or boolean for flags),
 * so numeric options are coerced here and rejected with a readable message.
 */

import { z } from 'zod';
import { CANONICAL_COLUMNS } from './columns';

// ============================================================================
// Project configuration (plotdata.config.json)
// ============================================================================

const AliasListSchema = z.array(z.string().min(1)).describe('Extra header names for a column');

export const ProjectConfigSchema = z
  .object({
    outdir: z.string().min(1).default('data').describe('Default output directory'),
    thrustmap: z
      .object({
        aggregate: z.boolean().default(false).describe('Average rows sharing a throttle/rpm value'),
      })
      .strict()
      .default({}),
    efficiency: z
      .object({
        bins: z
          .number()
          .int()
          .positive()
          .nullable()
          .default(null)
          .describe('Equal-width speed bins; null groups by unique speed'),
      })
      .strict()
      .default({}),
    aliases: z.record(z.enum(CANONICAL_COLUMNS), AliasListSchema).default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// ============================================================================
// Command-line options
// ============================================================================

const OutputNameSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .refine((name) => !/[\\/]/.test(name), 'must not contain path separators');

/** Numeric option given as text; blank values are rejected rather than coerced to 0 */
function numericOption(number: z.ZodNumber) {
  return z.string().trim().min(1, 'must not be empty').pipe(number).optional();
}

const CommonOptionsSchema = z.object({
  input: z.string().min(1),
  name: OutputNameSchema,
  outdir: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export const ThrustMapCliOptionsSchema = CommonOptionsSchema.extend({
  aggregate: z.boolean().optional(),
});

export const EfficiencyCliOptionsSchema = CommonOptionsSchema.extend({
  bins: numericOption(z.coerce.number().int().positive()),
});

export const LookupCliOptionsSchema = CommonOptionsSchema.extend({
  voltage: numericOption(z.coerce.number().finite()),
  minCmd: numericOption(z.coerce.number().finite()),
  maxCmd: numericOption(z.coerce.number().finite()),
});

export const InitCliOptionsSchema = z.object({
  force: z.boolean().default(false),
});

export type ThrustMapCliOptions = z.infer<typeof ThrustMapCliOptionsSchema>;
export type EfficiencyCliOptions = z.infer<typeof EfficiencyCliOptionsSchema>;
export type LookupCliOptions = z.infer<typeof LookupCliOptionsSchema>;
export type InitCliOptions = z.infer<typeof InitCliOptionsSchema>;

/** One line per issue, e.g. `bins: Number must be greater than 0` */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
