import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, isConfigKey } from "./defaults";

export function getConfigDir(): string {
  return join(homedir(), ".rps-arena");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

/** Raw values stored in the config file; unknown keys are skipped. */
export async function readConfigFile(path: string = getConfigPath()): Promise<Partial<ConfigData>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`${path} is not valid JSON. Fix or delete it.`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${path} does not contain a JSON object`);
  }

  const data: Partial<ConfigData> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key) && typeof value === "string") {
      data[key] = value;
    }
  }
  return data;
}

/** Read, change and write back the config file (mode 0600, it may hold a key). */
export async function editConfigFile(
  change: (data: Partial<ConfigData>) => void,
  path: string = getConfigPath(),
): Promise<Partial<ConfigData>> {
  const data = await readConfigFile(path);
  change(data);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
  return data;
}
