/**
 * Cell value constraints per declared column type.
 */

import { z } from "zod";
import type { ColumnType } from "../config/engine/schema.js";

const COLUMN_VALUE_SCHEMAS: Record<ColumnType, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number().finite(),
  integer: z.number().int(),
  boolean: z.boolean(),
  date: z.union([
    z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    z.string().regex(/^\d{2}-\d{2}-\d{2}$/),
    z.number().int().min(36_526).max(73_050),
  ]),
};

export function matchesColumnType(type: ColumnType, value: unknown): boolean {
  return COLUMN_VALUE_SCHEMAS[type].safeParse(value).success;
}
