import { z } from "zod";

/** Field names are case-sensitive and never normalized. */
export const FieldNameSchema = z.string().min(1, "Field names must be non-empty");

export const ColumnSetSchema = z.array(FieldNameSchema);

export const ColumnSetsSchema = z.array(ColumnSetSchema);

/** One record shape to support, as an ordered list of field names. */
export type ColumnSet = z.infer<typeof ColumnSetSchema>;
