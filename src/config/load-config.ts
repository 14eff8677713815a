import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import { type CleanerConfig, configSchema } from "./config-schema.js";

export const DEFAULT_CONFIG_FILE = "configuration.yml";

/**
 * Read and validate the YAML configuration file.
 * Every failure surfaces as a ConfigError; nothing can run without a session.
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_FILE): Promise<CleanerConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Configuration file ${path} could not be found`, { cause: err });
    }
    throw new ConfigError(`Failed to read configuration file ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid YAML: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const validation = configSchema.safeParse(document);
  if (!validation.success) {
    const issues = validation.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${path}: ${issues}`);
  }
  return validation.data;
}
