import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { ConfigurationError } from "../errors.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

export function parseConfig(raw: string): PipelineConfig {
  const parsed: unknown = YAML.parse(raw);
  const result = PipelineConfigSchema.safeParse(parsed);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      const pointer = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `  ${pointer}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid shipgate config:\n${messages.join("\n")}`);
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<PipelineConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config ${path}: ${message}`);
  }
  return parseConfig(raw);
}
