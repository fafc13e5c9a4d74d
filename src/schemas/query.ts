import { z } from "zod";
import { JsonObjectSchema } from "./json";

export const QuerySpecSchema = z.object({
  name: z
    .string()
    .refine((value) => value.trim().length > 0, "Query name must not be empty"),
  path: z.string(),
  body: JsonObjectSchema,
});

export const QuerySpecListSchema = z.array(QuerySpecSchema);

export type QuerySpec = Readonly<z.infer<typeof QuerySpecSchema>>;
