import type { Identity } from "../core/types.js";
import { RegistryError } from "../shared/errors.js";
import { normalizeIdentifier } from "../shared/ids.js";
import { log } from "../shared/logging.js";
import type { WritableIdentityRegistry } from "./types.js";

export type PersistIdentities = (identities: Identity[]) => Promise<void>;

export function createInMemoryRegistry(
  initial: Identity[] = [],
  persist?: PersistIdentities
): WritableIdentityRegistry {
  const identities = new Map<string, Identity>();
  for (const identity of initial) {
    const identifier = normalizeIdentifier(identity.identifier);
    if (!identities.has(identifier)) {
      identities.set(identifier, { identifier, displayName: identity.displayName });
    }
  }

  // Writes run one at a time so each check sees the previous write's result.
  let queue: Promise<unknown> = Promise.resolve();
  const serialized = <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task, task);
    queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  return {
    list(): Identity[] {
      return Array.from(identities.values(), (i) => ({ ...i }));
    },

    get(identifier: string): Identity | undefined {
      const found = identities.get(normalizeIdentifier(identifier));
      return found ? { ...found } : undefined;
    },

    get size(): number {
      return identities.size;
    },

    register(rawIdentifier: string, rawName: string): Promise<Identity> {
      return serialized(async () => {
        const identifier = normalizeIdentifier(rawIdentifier);
        const displayName = rawName.trim();
        if (!identifier) throw new RegistryError("Device identifier cannot be empty");
        if (!displayName) throw new RegistryError("Name cannot be empty");
        const existing = identities.get(identifier);
        if (existing) {
          throw new RegistryError(
            `Device ${identifier} is already registered to ${existing.displayName}`
          );
        }
        const identity: Identity = { identifier, displayName };
        await persist?.([...identities.values(), identity]);
        identities.set(identifier, identity);
        log.info(`Registered ${displayName} with device ${identifier}`);
        return { ...identity };
      });
    },

    remove(rawIdentifier: string): Promise<boolean> {
      return serialized(async () => {
        const identifier = normalizeIdentifier(rawIdentifier);
        const existing = identities.get(identifier);
        if (!existing) return false;
        await persist?.([...identities.values()].filter((i) => i.identifier !== identifier));
        identities.delete(identifier);
        log.info(`Removed ${existing.displayName} (${identifier})`);
        return true;
      });
    },
  };
}
