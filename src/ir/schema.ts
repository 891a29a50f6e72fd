import { z } from "zod";

export const fieldTypeKinds = [
  "str",
  "text",
  "int",
  "decimal",
  "bool",
  "date",
  "datetime",
  "uuid",
  "enum",
  "ref",
  "email"
] as const;

export const fieldModifiers = ["required", "optional", "pk", "unique", "unique?", "auto_add", "auto_update"] as const;

export const surfaceModes = ["view", "create", "edit", "list", "custom"] as const;

const fieldTypeSchema = z
  .object({
    kind: z.enum(fieldTypeKinds),
    max_length: z.number().int().positive().optional(),
    precision: z.number().int().positive().optional(),
    scale: z.number().int().nonnegative().optional(),
    enum_values: z.array(z.string().min(1)).optional(),
    ref_entity: z.string().min(1).optional()
  })
  .superRefine((value, ctx) => {
    if (value.kind === "enum" && (!value.enum_values || value.enum_values.length === 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "enum fields require enum_values" });
    }
    if (value.kind === "ref" && !value.ref_entity) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "ref fields require ref_entity" });
    }
  });

const fieldSchema = z.object({
  name: z.string().min(1, "field name is required"),
  type: fieldTypeSchema,
  modifiers: z.array(z.enum(fieldModifiers)).default([]),
  default: z.union([z.string(), z.number(), z.boolean()]).optional()
});

const constraintSchema = z.object({
  kind: z.enum(["unique", "index"]),
  fields: z.array(z.string().min(1)).min(1)
});

const entitySchema = z.object({
  name: z.string().min(1, "entity name is required"),
  title: z.string().optional(),
  fields: z.array(fieldSchema),
  constraints: z.array(constraintSchema).default([])
});

const surfaceElementSchema = z.object({
  field_name: z.string().min(1),
  label: z.string().optional(),
  options: z.record(z.string(), z.unknown()).default({})
});

const surfaceSectionSchema = z.object({
  name: z.string().min(1),
  title: z.string().optional(),
  elements: z.array(surfaceElementSchema).default([])
});

const surfaceSchema = z.object({
  name: z.string().min(1, "surface name is required"),
  title: z.string().optional(),
  entity_ref: z.string().min(1).optional(),
  mode: z.enum(surfaceModes),
  sections: z.array(surfaceSectionSchema).default([])
});

const serviceSchema = z.object({
  name: z.string().min(1, "service name is required"),
  title: z.string().optional(),
  spec_url: z.string().optional(),
  owner: z.string().optional()
});

const workspaceRegionSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1),
  display: z.enum(["list", "grid", "timeline", "map", "detail", "summary"]).default("list")
});

const workspaceSchema = z.object({
  name: z.string().min(1, "workspace name is required"),
  title: z.string().optional(),
  purpose: z.string().optional(),
  regions: z.array(workspaceRegionSchema).default([])
});

const moduleSchema = z.object({
  name: z.string().min(1, "module name is required"),
  uses: z.array(z.string()).default([])
});

export const irSchema = z.object({
  name: z.string().min(1, "app name is required"),
  title: z.string().optional(),
  version: z.string().default("0.1.0"),
  modules: z.array(moduleSchema).default([]),
  entities: z.array(entitySchema).default([]),
  surfaces: z.array(surfaceSchema).default([]),
  services: z.array(serviceSchema).default([]),
  workspaces: z.array(workspaceSchema).default([]),
  metadata: z.record(z.string(), z.unknown()).default({})
});

export type AppIR = z.infer<typeof irSchema>;
export type AppIRInput = z.input<typeof irSchema>;
export type ModuleSpec = AppIR["modules"][number];
export type EntitySpec = AppIR["entities"][number];
export type FieldSpec = EntitySpec["fields"][number];
export type FieldType = FieldSpec["type"];
export type SurfaceSpec = AppIR["surfaces"][number];
export type ServiceSpec = AppIR["services"][number];
export type WorkspaceSpec = AppIR["workspaces"][number];

export type DeepReadonly<T> = T extends (infer Item)[]
  ? ReadonlyArray<DeepReadonly<Item>>
  : T extends object
    ? { readonly [Key in keyof T]: DeepReadonly<T[Key]> }
    : T;

/** The immutable IR graph handed to every generator and hook of a run. */
export type IRSnapshot = DeepReadonly<AppIR>;

export type IRNodeKind = "module" | "entity" | "field" | "surface" | "service" | "workspace";

export type IRNodeRef = {
  kind: IRNodeKind;
  name: string;
};
