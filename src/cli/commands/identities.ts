import { validated } from "../../shared/assert.js";
import { RegistryError } from "../../shared/errors.js";
import { loadContext } from "../context.js";
import { GlobalOptions, parseGlobalOptions } from "../utils.js";

const ListOptions = GlobalOptions.and({ "json?": "boolean" });

export async function runIdentitiesList(raw: unknown): Promise<void> {
  const opts = validated(ListOptions(raw), "options");
  const { registry } = await loadContext(opts);
  const identities = registry.list();

  if (opts.json) {
    process.stdout.write(JSON.stringify(identities, null, 2) + "\n");
    return;
  }
  if (identities.length === 0) {
    process.stderr.write("No identities registered. Run `rollcall register` first.\n");
    return;
  }
  const width = Math.max(4, ...identities.map((i) => i.displayName.length));
  process.stdout.write(`${"Name".padEnd(width)}  Beacon ID\n`);
  for (const identity of identities) {
    process.stdout.write(`${identity.displayName.padEnd(width)}  ${identity.identifier}\n`);
  }
}

export async function runIdentitiesRemove(identifier: string, raw: unknown): Promise<void> {
  const opts = parseGlobalOptions(raw);
  const { registry } = await loadContext(opts);
  const removed = await registry.remove(identifier);
  if (!removed) throw new RegistryError(`No identity registered for ${identifier}`);
}
