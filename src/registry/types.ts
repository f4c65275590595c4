import type { Identity } from "../core/types.js";

/** Read side of the registry, all a session needs. */
export interface IdentityRegistry {
  /** Identities in registration order. */
  list(): Identity[];
  get(identifier: string): Identity | undefined;
  readonly size: number;
}

export interface WritableIdentityRegistry extends IdentityRegistry {
  register(identifier: string, displayName: string): Promise<Identity>;
  remove(identifier: string): Promise<boolean>;
}
