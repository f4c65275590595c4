import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { type } from "arktype";
import type { Identity } from "../core/types.js";
import { genId, normalizeIdentifier } from "../shared/ids.js";
import { log } from "../shared/logging.js";
import { createInMemoryRegistry } from "./memory.js";
import type { WritableIdentityRegistry } from "./types.js";

/** On-disk shape: `{ "<identifier>": { "name": "...", "beacon_id": "<identifier>" } }`. */
const RegistryFileSchema = type({
  "[string]": {
    name: "string",
    "beacon_id?": "string",
  },
});

export function parseRegistryFile(data: unknown): Identity[] {
  const result = RegistryFileSchema(data);
  if (result instanceof type.errors) {
    throw new Error(`Invalid registry file: ${result.summary}`);
  }
  return Object.entries(result).map(([identifier, entry]) => ({
    identifier: normalizeIdentifier(identifier),
    displayName: entry.name,
  }));
}

export function serializeRegistry(
  identities: Identity[]
): Record<string, { name: string; beacon_id: string }> {
  const out: Record<string, { name: string; beacon_id: string }> = {};
  for (const identity of identities) {
    out[identity.identifier] = { name: identity.displayName, beacon_id: identity.identifier };
  }
  return out;
}

/**
 * Read the registry file. A missing file is an empty registry; an unreadable
 * or malformed one is logged and also treated as empty.
 */
export async function loadRegistryFile(filePath: string): Promise<Identity[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT") {
      log.info(`No registry file at ${filePath}, starting with no registered identities`);
      return [];
    }
    log.error(`Could not read ${filePath}: ${String(error)}. Starting with an empty registry.`);
    return [];
  }
  try {
    const identities = parseRegistryFile(JSON.parse(raw));
    log.info(`Loaded ${identities.length} registered identities from ${filePath}`);
    return identities;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Could not load ${filePath}: ${message}. Starting with an empty registry.`);
    return [];
  }
}

export async function saveRegistryFile(filePath: string, identities: Identity[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${genId("tmp")}`;
  await writeFile(tmp, JSON.stringify(serializeRegistry(identities), null, 4) + "\n", "utf8");
  await rename(tmp, filePath);
  log.debug(`Saved ${identities.length} identities to ${filePath}`);
}

export async function createFileRegistry(filePath: string): Promise<WritableIdentityRegistry> {
  const initial = await loadRegistryFile(filePath);
  return createInMemoryRegistry(initial, (identities) => saveRegistryFile(filePath, identities));
}
