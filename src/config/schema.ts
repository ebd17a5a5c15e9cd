import { z } from 'zod';

const symbolPairSchema = z.tuple([z.string().min(1), z.string()]);
const symbolPairsSchema = z.array(symbolPairSchema);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Validated as own entries: copying into a record would drop a `__proto__` symbol.
const symbolRecordSchema = z
  .custom<Record<string, unknown>>(isPlainObject, { message: 'Expected an object mapping symbols to replacements' })
  .transform((record) => Object.entries(record))
  .pipe(symbolPairsSchema);

/** A record, or an ordered list of pairs when the same symbol is given twice. Both parse to pairs. */
export const symbolsSchema = z.union([symbolPairsSchema, symbolRecordSchema]);

const settingsSchema = z.object({
  strategy: z.enum(['regex', 'trie']).optional(),
  bypassSecurity: z.boolean().optional(),
  threatPatterns: z.array(z.string().min(1)).optional(),
});

const profileSchema = settingsSchema.extend({
  symbols: symbolsSchema.optional(),
});

export const transpilerConfigSchema = settingsSchema.extend({
  symbols: symbolsSchema,
  profiles: z.record(z.string(), profileSchema).optional(),
});

export type TranspilerConfig = z.infer<typeof transpilerConfigSchema>;

/** A config with its profile applied and symbols flattened to ordered pairs. */
export interface ResolvedConfig {
  symbols: Array<[string, string]>;
  strategy?: 'regex' | 'trie';
  bypassSecurity: boolean;
  threatPatterns: string[];
}
