import type { ExpressModel } from "./artifacts.js";

const jsList = (values: readonly string[]): string => `[${values.map((value) => JSON.stringify(value)).join(", ")}]`;

export const templateModel = (model: ExpressModel): string => `const { randomUUID } = require("node:crypto");

const records = new Map();
const fields = ${jsList(model.fields)};
const requiredFields = ${jsList(model.required)};

const pick = (input) => Object.fromEntries(fields.filter((field) => field in input).map((field) => [field, input[field]]));

module.exports = {
  name: ${JSON.stringify(model.className)},
  missingFields: (input) => requiredFields.filter((field) => input[field] === undefined || input[field] === null),
  list: () => Array.from(records.values()),
  get: (id) => records.get(id) ?? null,
  create: (input) => {
    const record = { ...pick(input), id: randomUUID() };
    records.set(record.id, record);
    return record;
  },
  update: (id, input) => {
    const current = records.get(id);
    if (!current) return null;
    const record = { ...current, ...pick(input), id };
    records.set(id, record);
    return record;
  }
};
`;

export const templateRoute = (model: ExpressModel): string => `const express = require("express");
const ${model.className} = require("../${model.file}");

const router = express.Router();

router.get("/", (req, res) => res.json(${model.className}.list()));

router.get("/:id", (req, res) => {
  const record = ${model.className}.get(req.params.id);
  if (!record) return res.status(404).json({ error: "not found" });
  return res.json(record);
});

router.post("/", (req, res) => {
  const missing = ${model.className}.missingFields(req.body);
  if (missing.length > 0) return res.status(400).json({ error: "missing fields", missing });
  return res.status(201).json(${model.className}.create(req.body));
});

router.put("/:id", (req, res) => {
  const record = ${model.className}.update(req.params.id, req.body);
  if (!record) return res.status(404).json({ error: "not found" });
  return res.json(record);
});

module.exports = router;
`;

export const templatePackageJson = (slug: string, version: string, nodeVersion: number): string =>
  `${JSON.stringify(
    {
      name: slug,
      version,
      private: true,
      main: "server.js",
      scripts: { start: "node server.js" },
      engines: { node: `>=${nodeVersion}` },
      dependencies: { express: "^4.19.2" }
    },
    null,
    2
  )}\n`;

export const templateServer = (models: readonly ExpressModel[], port: number): string => {
  const mounts = models
    .map((model) => `app.use(${JSON.stringify(model.route)}, require("./routes/${model.file.replace(/^models\//, "")}"));`)
    .join("\n");

  return `const express = require("express");

const app = express();
app.use(express.json());

${mounts}

const port = Number(process.env.PORT ?? ${port});
app.listen(port, () => {
  console.log("listening on port " + port);
});
`;
};

export const templateReadme = (title: string, models: readonly ExpressModel[], port: number): string => {
  const routes = models.map((model) => `- \`${model.route}\` (${model.className})`).join("\n");
  return `# ${title}

Express service with in-memory storage.

## Run

\`\`\`
npm install
npm start
\`\`\`

The server listens on port ${port} unless \`PORT\` is set.

## Routes

${routes || "No entities declared."}
`;
};
