import { defineGenerator, writeArtifact, type GeneratorContext } from "../../engine/generator.js";
import type { DeepReadonly, EntitySpec, FieldSpec } from "../../ir/schema.js";
import { toPascalCase } from "../naming.js";
import { openapiSchemasArtifact, type OpenapiSchemas } from "./artifacts.js";

type JsonSchema = Record<string, unknown>;

const readOnlyModifiers = new Set(["pk", "auto_add", "auto_update"]);

const fieldSchema = (ctx: GeneratorContext, entity: DeepReadonly<EntitySpec>, field: DeepReadonly<FieldSpec>): JsonSchema => {
  const { type } = field;
  let schema: JsonSchema;
  switch (type.kind) {
    case "str":
      schema = type.max_length ? { type: "string", maxLength: type.max_length } : { type: "string" };
      break;
    case "text":
      schema = { type: "string" };
      break;
    case "int":
      schema = { type: "integer" };
      break;
    case "decimal":
      schema = { type: "number" };
      break;
    case "bool":
      schema = { type: "boolean" };
      break;
    case "date":
      schema = { type: "string", format: "date" };
      break;
    case "datetime":
      schema = { type: "string", format: "date-time" };
      break;
    case "uuid":
      schema = { type: "string", format: "uuid" };
      break;
    case "email":
      schema = { type: "string", format: "email" };
      break;
    case "enum":
      schema = { type: "string", enum: [...(type.enum_values ?? [])] };
      break;
    case "ref": {
      const target = type.ref_entity ?? "";
      if (!ctx.ir.entities.some((candidate) => candidate.name === target)) {
        ctx.fail({ kind: "field", name: `${entity.name}.${field.name}` }, `references unknown entity ${target}`);
      }
      schema = { type: "string", format: "uuid", description: `Reference to ${target}` };
      break;
    }
  }

  if (field.modifiers.some((modifier) => readOnlyModifiers.has(modifier))) schema.readOnly = true;
  if (field.default !== undefined) schema.default = field.default;
  return schema;
};

const isRequired = (field: DeepReadonly<FieldSpec>): boolean =>
  field.modifiers.includes("required") || field.modifiers.includes("pk");

const entitySchema = (ctx: GeneratorContext, entity: DeepReadonly<EntitySpec>): JsonSchema => {
  const properties: Record<string, JsonSchema> = {};
  entity.fields.forEach((field) => {
    properties[field.name] = fieldSchema(ctx, entity, field);
  });
  const required = entity.fields.filter(isRequired).map((field) => field.name);

  const schema: JsonSchema = { type: "object", properties };
  if (entity.title) schema.title = entity.title;
  if (required.length > 0) schema.required = required;
  return schema;
};

export const openapiSchemasGenerator = defineGenerator({
  id: "openapi_schemas",
  description: "Entity schemas for the OpenAPI document",
  produces: [openapiSchemasArtifact],
  outputs: [],
  run: (ctx) => {
    const schemas: OpenapiSchemas = {};
    ctx.ir.entities.forEach((entity) => {
      schemas[toPascalCase(entity.name)] = entitySchema(ctx, entity);
    });
    const warnings = ctx.ir.entities.length === 0 ? ["IR declares no entities; the document has no schemas"] : [];
    return { artifacts: [writeArtifact(openapiSchemasArtifact, schemas)], warnings };
  }
});
