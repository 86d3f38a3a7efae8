import { z } from 'zod';
import type { JsonValue, Metadata } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const MetadataSchema: z.ZodType<Metadata> = z.record(JsonValueSchema);

export const TagsSchema = z.array(z.string());

export function parseJson<T>(schema: z.ZodType<T>, text: string): T {
  return schema.parse(JSON.parse(text));
}
