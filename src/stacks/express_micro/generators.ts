import { defineGenerator, emitFile, writeArtifact } from "../../engine/generator.js";
import { toPascalCase, toSlug, toSnakeCase } from "../naming.js";
import {
  expressModelsArtifact,
  expressOptionsSchema,
  expressRuntimeArtifact,
  type ExpressModel
} from "./artifacts.js";
import { templateModel, templatePackageJson, templateReadme, templateRoute, templateServer } from "./templates.js";

export const expressModelsGenerator = defineGenerator({
  id: "express_models",
  description: "In-memory model module per entity",
  produces: [expressModelsArtifact],
  outputs: ["models/*.js"],
  run: (ctx) => {
    const models: ExpressModel[] = ctx.ir.entities.map((entity) => ({
      entity: entity.name,
      className: toPascalCase(entity.name),
      file: `models/${toSnakeCase(entity.name)}.js`,
      route: `/${toSlug(entity.name, "items")}`,
      fields: entity.fields.map((field) => field.name),
      required: entity.fields
        .filter((field) => field.modifiers.includes("required") && !field.modifiers.includes("pk"))
        .map((field) => field.name)
    }));

    return {
      files: models.map((model) => emitFile(model.file, templateModel(model))),
      artifacts: [writeArtifact(expressModelsArtifact, models)],
      warnings: models.length === 0 ? ["IR declares no entities; the service exposes no routes"] : []
    };
  }
});

export const expressRoutesGenerator = defineGenerator({
  id: "express_routes",
  description: "Express router per model",
  requires: [expressModelsArtifact],
  outputs: ["routes/*.js"],
  run: (ctx) => {
    const models = ctx.artifacts.get(expressModelsArtifact);
    return {
      files: models.map((model) => emitFile(model.file.replace(/^models\//, "routes/"), templateRoute(model)))
    };
  }
});

export const expressProjectGenerator = defineGenerator({
  id: "express_project",
  description: "package.json, server entry point and README",
  requires: [expressModelsArtifact, expressRuntimeArtifact],
  outputs: ["package.json", "server.js", "README.md"],
  run: (ctx) => {
    const options = expressOptionsSchema.parse(ctx.options);
    const models = ctx.artifacts.get(expressModelsArtifact);
    const runtime = ctx.artifacts.get(expressRuntimeArtifact);

    return {
      files: [
        emitFile("package.json", templatePackageJson(toSlug(ctx.ir.name), ctx.ir.version, runtime.node_version)),
        emitFile("server.js", templateServer(models, options.port)),
        emitFile("README.md", templateReadme(ctx.ir.title ?? ctx.ir.name, models, options.port))
      ]
    };
  }
});
