/**
 * Engine configuration schema.
 *
 * IMMUTABILITY:
 * DataType, HubNode and WorkflowStep declarations are loaded once at process
 * start, validated here, frozen by the loader and never mutated afterwards.
 * Every address the engine computes and every causality check it performs is
 * a function of this configuration, so changing it mid-run would let two
 * steps of the same run disagree about where an artifact lives or whether a
 * read is legal. Configuration changes require a restart.
 */

import { z } from "zod";
import { filenamePatternIssues } from "../../schema/filename-pattern.js";
import { fromYymmdd } from "../../timestamp/index.js";

// ============================================================
// Shared primitives
// ============================================================

const Name = z
  .string()
  .min(1)
  .refine((val) => !val.includes("/"), "Names must not contain '/'");

/**
 * Hub and data type names become folder names of an address. A leading "."
 * would allow "." and ".." and clash with the ".baseline" folder.
 */
const FolderName = Name.refine((val) => !val.startsWith("."), "Names must not start with '.'");

/**
 * Value types a required column may declare.
 *
 * "date" accepts "YYYY-MM-DD" or "YY-MM-DD" text, or a spreadsheet serial
 * date between 2000-01-01 and 2099-12-31.
 */
export const ColumnType = z.enum(["string", "number", "integer", "boolean", "date"]);
export type ColumnType = z.infer<typeof ColumnType>;

export const AnnotationPolicy = z.enum(["non-blank", "differs-from-baseline"]);
export type AnnotationPolicy = z.infer<typeof AnnotationPolicy>;

export const TimestampFormatSchema = z.enum(["tick", "yymmdd"]);

/**
 * An absolute timestamp: a tick, or a "YYMMDD" date under the day-based axis.
 */
export const AbsoluteTimestampSchema = z.union([
  z.number().int().min(0),
  z
    .string()
    .regex(/^\d{6}$/, "Expected a non-negative integer or a YYMMDD date")
    .transform((val, ctx) => {
      try {
        return fromYymmdd(val);
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: err instanceof Error ? err.message : String(err),
        });
        return z.NEVER;
      }
    }),
]);

// ============================================================
// Data types
// ============================================================

/**
 * A required column. A bare string is shorthand for a nullable string column.
 */
export const ColumnSpecSchema = z.union([
  Name.transform((name) => ({ name, type: "string" as const, nullable: true })),
  z
    .object({
      name: Name,
      type: ColumnType.default("string"),
      /** Whether blank cells are accepted */
      nullable: z.boolean().default(true),
    })
    .strict(),
]);

export type ColumnSpec = z.infer<typeof ColumnSpecSchema>;

export const DataTypeSchema = z
  .object({
    name: FolderName.describe("Unique identifier of the data type"),

    columns: z
      .array(ColumnSpecSchema)
      .min(1)
      .describe("Required columns, in order, with their value constraints"),

    annotatedColumns: z
      .array(z.string().min(1))
      .default([])
      .describe("Columns users may edit; their edits are carried forward"),

    rowKey: z
      .union([z.string().min(1).transform((key) => [key]), z.array(z.string().min(1)).min(1)])
      .describe("Natural key column(s) identifying a row across timestamps"),

    filenamePattern: z
      .string()
      .min(1)
      .superRefine((pattern, ctx) => {
        for (const issue of filenamePatternIssues(pattern)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `filenamePattern ${issue}` });
        }
      })
      .describe("Filename template with {logicalId} and {timestamp} placeholders"),

    keepBaseline: z
      .boolean()
      .default(false)
      .describe("Store the machine-computed table next to each published artifact"),
  })
  .strict()
  .superRefine((decl, ctx) => {
    const columnNames = decl.columns.map((c) => c.name);
    const seen = new Set<string>();
    for (const name of columnNames) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["columns"],
          message: `Duplicate column "${name}"`,
        });
      }
      seen.add(name);
    }
    for (const key of decl.rowKey) {
      if (!seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rowKey"],
          message: `Row key column "${key}" is not a required column`,
        });
      }
      if (decl.annotatedColumns.includes(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["annotatedColumns"],
          message: `Row key column "${key}" cannot be annotated`,
        });
      }
    }
  });

export type DataTypeInput = z.input<typeof DataTypeSchema>;
export type DataTypeDefinition = z.infer<typeof DataTypeSchema>;

// ============================================================
// Hubs
// ============================================================

export const HubSchema = z
  .object({
    name: FolderName.describe("Unique hub name"),
    parent: Name.nullable().default(null).describe("Parent hub, null for a root"),
    hosts: z
      .array(z.string().min(1))
      .default([])
      .describe("Data types stored at this node (not inherited by children)"),
    description: z.string().optional(),
  })
  .strict();

export type HubInput = z.input<typeof HubSchema>;
export type HubDefinition = z.infer<typeof HubSchema>;

// ============================================================
// Workflow steps
// ============================================================

export const LogicalObjectSchema = z
  .object({
    dataType: z.string().min(1),
    logicalId: z.string().min(1),
  })
  .strict();

export const InputBindingSchema = z
  .object({
    object: LogicalObjectSchema,
    hub: z.string().min(1),
    /** Relative to the run timestamp: 0 is the run itself, negative is earlier */
    offset: z.number().int().optional(),
    /** Absolute timestamp, mutually exclusive with offset */
    at: AbsoluteTimestampSchema.optional(),
  })
  .strict()
  .refine((binding) => binding.offset === undefined || binding.at === undefined, {
    message: "An input binding takes either offset or at, not both",
  })
  .transform((binding) =>
    binding.at !== undefined
      ? { object: binding.object, hub: binding.hub, at: binding.at }
      : { object: binding.object, hub: binding.hub, offset: binding.offset ?? 0 }
  );

export const OutputBindingSchema = z
  .object({
    object: LogicalObjectSchema,
    hub: z.string().min(1),
  })
  .strict();

export const StepSchema = z
  .object({
    id: z.string().min(1).describe("Unique step id"),
    logic: z.string().min(1).describe("Name of the registered business-logic plugin"),
    inputs: z
      .record(z.string().min(1), InputBindingSchema)
      .default({})
      .describe("Named input bindings passed to the plugin"),
    output: OutputBindingSchema.describe("The single object this step writes at the run timestamp"),
    optional: z
      .boolean()
      .default(false)
      .describe("Skip instead of failing when an input cannot be resolved"),
    overwrite: z
      .boolean()
      .optional()
      .describe("Replace an existing artifact at the run timestamp; defaults to the engine option"),
    mergeAnnotations: z
      .boolean()
      .default(false)
      .describe("Carry annotations from the previous version of the output forward"),
  })
  .strict();

export type StepInput = z.input<typeof StepSchema>;
export type StepDefinition = z.infer<typeof StepSchema>;

// ============================================================
// Engine
// ============================================================

export const EngineOptionsSchema = z
  .object({
    overwrite: z.boolean().default(false),
    annotationPolicy: AnnotationPolicy.default("non-blank"),
    timestampFormat: TimestampFormatSchema.default("tick"),
    maxConcurrency: z.number().int().min(1).default(4),
  })
  .strict();

export type EngineOptions = z.infer<typeof EngineOptionsSchema>;

/**
 * Complete engine configuration.
 */
export const EngineConfigSchema = z
  .object({
    version: z
      .string()
      .regex(/^\d+\.\d+\.\d+$/)
      .describe("Semantic version of this configuration"),
    options: EngineOptionsSchema.default({}),
    dataTypes: z.array(DataTypeSchema).describe("Data type declarations"),
    hubs: z.array(HubSchema).describe("Hub taxonomy"),
    steps: z.array(StepSchema).default([]).describe("Workflow step declarations"),
  })
  .strict();

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
