import { stringify } from "yaml";
import { defineGenerator, emitFile, type GeneratorContext } from "../../engine/generator.js";
import type { DeepReadonly, SurfaceSpec } from "../../ir/schema.js";
import { toPascalCase, toSlug } from "../naming.js";
import { openapiOptionsSchema, openapiSchemasArtifact, type OpenapiSchemas } from "./artifacts.js";

type Operation = Record<string, unknown>;
type PathItem = Record<string, Operation>;

type Route = {
  path: string;
  method: "get" | "post" | "put";
  operation: Operation;
};

const refTo = (schemaName: string): Record<string, string> => ({ $ref: `#/components/schemas/${schemaName}` });

const jsonBody = (schema: unknown): Record<string, unknown> => ({ content: { "application/json": { schema } } });

const idParameter = (): Record<string, unknown> => ({ name: "id", in: "path", required: true, schema: { type: "string" } });

const routeFor = (surface: DeepReadonly<SurfaceSpec>, entityName: string): Route | null => {
  const schemaName = toPascalCase(entityName);
  const collection = `/${toSlug(entityName, "items")}`;
  const base: Operation = { operationId: surface.name, summary: surface.title ?? surface.name };

  switch (surface.mode) {
    case "list":
      return {
        path: collection,
        method: "get",
        operation: { ...base, responses: { "200": { description: "OK", ...jsonBody({ type: "array", items: refTo(schemaName) }) } } }
      };
    case "view":
      return {
        path: `${collection}/{id}`,
        method: "get",
        operation: {
          ...base,
          parameters: [idParameter()],
          responses: { "200": { description: "OK", ...jsonBody(refTo(schemaName)) }, "404": { description: "Not found" } }
        }
      };
    case "create":
      return {
        path: collection,
        method: "post",
        operation: {
          ...base,
          requestBody: { required: true, ...jsonBody(refTo(schemaName)) },
          responses: { "201": { description: "Created", ...jsonBody(refTo(schemaName)) } }
        }
      };
    case "edit":
      return {
        path: `${collection}/{id}`,
        method: "put",
        operation: {
          ...base,
          parameters: [idParameter()],
          requestBody: { required: true, ...jsonBody(refTo(schemaName)) },
          responses: { "200": { description: "OK", ...jsonBody(refTo(schemaName)) }, "404": { description: "Not found" } }
        }
      };
    case "custom":
      return null;
  }
};

const buildPaths = (ctx: GeneratorContext, schemas: OpenapiSchemas, warnings: string[]): Record<string, PathItem> => {
  const paths: Record<string, PathItem> = {};

  ctx.ir.surfaces.forEach((surface) => {
    if (!surface.entity_ref) {
      warnings.push(`surface ${surface.name} has no entity; no path generated`);
      return;
    }
    if (!(toPascalCase(surface.entity_ref) in schemas)) {
      ctx.fail({ kind: "surface", name: surface.name }, `references unknown entity ${surface.entity_ref}`);
    }

    const route = routeFor(surface, surface.entity_ref);
    if (!route) {
      warnings.push(`surface ${surface.name} is custom; no path generated`);
      return;
    }
    const item = paths[route.path] ?? {};
    if (item[route.method]) {
      warnings.push(`surface ${surface.name} repeats ${route.method.toUpperCase()} ${route.path}; kept the first`);
      return;
    }
    item[route.method] = route.operation;
    paths[route.path] = item;
  });

  return paths;
};

export const openapiDocumentGenerator = defineGenerator({
  id: "openapi_document",
  description: "OpenAPI 3 document built from entities and surfaces",
  requires: [openapiSchemasArtifact],
  outputs: ["openapi.yaml", "openapi.json"],
  run: (ctx) => {
    const options = openapiOptionsSchema.parse(ctx.options);
    const schemas = ctx.artifacts.get(openapiSchemasArtifact);
    const warnings: string[] = [];

    const document: Record<string, unknown> = {
      openapi: "3.0.3",
      info: { title: ctx.ir.title ?? ctx.ir.name, version: ctx.ir.version }
    };
    if (options.server_url) document.servers = [{ url: options.server_url }];
    document.paths = buildPaths(ctx, schemas, warnings);
    document.components = { schemas };

    const file =
      options.format === "json"
        ? emitFile("openapi.json", `${JSON.stringify(document, null, 2)}\n`)
        : emitFile("openapi.yaml", stringify(document));
    return { files: [file], warnings };
  }
});
