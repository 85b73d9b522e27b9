import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { z } from "zod/v4";
import { ConfigInvalidError, ConfigMissingError, InvalidArgumentError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { GeSeerConfig } from "../utils/types.js";
import { DEFAULT_CONFIG_FILE, USER_AGENT_PREFIX } from "./constants.js";

const log = createLogger("config");

export const CONTACT_TYPES = ["discord", "email"] as const;
export type ContactType = (typeof CONTACT_TYPES)[number];

const ConfigSchema = z.object({
  user_agent: z.string().trim().min(1),
  data_dir: z.string().refine((p) => isAbsolute(p), { message: "data_dir must be an absolute path" }),
});

export interface SaveConfigInput {
  contactInfo: string;
  contactType: string;
  dataDir: string;
}

export function isContactType(value: string): value is ContactType {
  return (CONTACT_TYPES as readonly string[]).includes(value);
}

/** The prices API asks for a User-Agent that says how to reach the operator. */
export function buildUserAgent(contactInfo: string, contactType: string): string {
  const info = contactInfo.trim();
  if (info === "") {
    throw new InvalidArgumentError("Contact info must not be empty");
  }

  let contact: string;
  if (contactType === "discord") {
    contact = `${info} on Discord`;
  } else if (contactType === "email") {
    contact = `${info} via Email`;
  } else {
    throw new InvalidArgumentError(
      `Invalid contact type "${contactType}". Must be one of: ${CONTACT_TYPES.join(", ")}`,
    );
  }
  return `${USER_AGENT_PREFIX} - ${contact}`;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function getConfigPath(override?: string): string {
  return override ? resolve(expandHome(override)) : DEFAULT_CONFIG_FILE;
}

export async function saveConfig(
  input: SaveConfigInput,
  configPath: string = DEFAULT_CONFIG_FILE,
): Promise<GeSeerConfig> {
  const userAgent = buildUserAgent(input.contactInfo, input.contactType);
  const dataDir = resolve(expandHome(input.dataDir));

  await mkdir(dataDir, { recursive: true });
  await mkdir(dirname(configPath), { recursive: true });

  const config: GeSeerConfig = { user_agent: userAgent, data_dir: dataDir };
  await writeFile(configPath, JSON.stringify(config, null, 4), "utf-8");

  log.info("Configuration saved", { path: configPath, dataDir });
  return config;
}

export async function loadConfig(configPath: string = DEFAULT_CONFIG_FILE): Promise<GeSeerConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigMissingError(configPath);
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigInvalidError(configPath, "not valid JSON");
  }

  const parsed = ConfigSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigInvalidError(configPath, reason);
  }
  return parsed.data;
}
