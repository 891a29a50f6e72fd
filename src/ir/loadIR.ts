import { readFile } from "node:fs/promises";
import { irSchema, type IRSnapshot } from "./schema.js";

// Visits frozen nodes too: a shallow-frozen parent may still hold mutable children.
export const deepFreeze = <T>(value: T, seen: WeakSet<object> = new WeakSet()): T => {
  if (value === null || typeof value !== "object" || seen.has(value) || ArrayBuffer.isView(value)) return value;
  seen.add(value);
  Object.values(value).forEach((child) => {
    deepFreeze(child, seen);
  });
  if (!Object.isFrozen(value)) Object.freeze(value);
  return value;
};

export const freezeSnapshot = (ir: IRSnapshot): IRSnapshot => deepFreeze(ir);

export const parseIR = (raw: unknown): IRSnapshot => freezeSnapshot(irSchema.parse(raw));

export const loadIR = async (irPath: string): Promise<IRSnapshot> => {
  const rawText = await readFile(irPath, "utf8");
  const rawJson: unknown = JSON.parse(rawText);
  return parseIR(rawJson);
};
