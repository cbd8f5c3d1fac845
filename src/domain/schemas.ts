import { z } from 'zod';

export const PrepositionSchema = z.enum(['in', 'at'], {
  errorMap: () => ({ message: "expected 'in' or 'at'" })
});

export const CliArgsSchema = z.object({
  first_value: z.string().trim().min(1),
  preposition: PrepositionSchema,
  second_value: z.string().trim().min(1),
  no_color: z.boolean().default(false)
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

const flag = z
  .string()
  .optional()
  .transform((v) => v !== undefined && /^(1|true|yes|on)$/i.test(v.trim()));

export const EnvSchema = z.object({
  NO_COLOR: z.string().optional().transform((v) => v !== undefined && v !== ''),
  PACECALC_DEBUG: flag
});
