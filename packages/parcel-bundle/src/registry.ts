// Creator registry: type name -> record decoder.
//
// Registries are plain objects handed to each decode call; there is no
// process-wide instance. Lookups happen once per PARCELABLEARRAY element.

import { ParcelError, type ParcelCursor } from "@parcelkit/binary";
import { log } from "./logging.ts";
import { registerBuiltinCreators, type ParcelableRecord } from "./records.ts";

/**
 * Decodes one polymorphic record.
 *
 * The cursor is positioned right after the record's type name; the creator
 * must consume exactly the record's bytes.
 */
export interface ParcelableCreator {
  createFromParcel(cursor: ParcelCursor, name: string): ParcelableRecord;
}

export class CreatorRegistry {
  private creators = new Map<string, ParcelableCreator>();

  /**
   * Register a creator. A later registration under the same name replaces
   * the earlier one.
   */
  register(name: string, creator: ParcelableCreator): void {
    if (this.creators.has(name)) {
      log.registry("replacing creator for %s", name);
    } else {
      log.registry("registering creator for %s", name);
    }
    this.creators.set(name, creator);
  }

  /**
   * Register a creator unless one already exists under `name`.
   *
   * `factory` only runs when the name is new. Returns whether it did.
   */
  registerOnce(name: string, factory: () => ParcelableCreator): boolean {
    if (this.creators.has(name)) return false;
    this.register(name, factory());
    return true;
  }

  /** Resolve a creator, throwing `nameNotFound` when none is registered. */
  lookup(name: string): ParcelableCreator {
    const creator = this.creators.get(name);
    if (!creator) {
      log.registry("no creator registered for %s", name);
      throw ParcelError.nameNotFound(name);
    }
    return creator;
  }

  has(name: string): boolean {
    return this.creators.has(name);
  }

  get size(): number {
    return this.creators.size;
  }

  names(): string[] {
    return [...this.creators.keys()];
  }
}

export interface CreatorRegistryOptions {
  /** Register the built-in record creators. Defaults to true. */
  builtins?: boolean;
}

export function createCreatorRegistry(options: CreatorRegistryOptions = {}): CreatorRegistry {
  const registry = new CreatorRegistry();
  if (options.builtins ?? true) {
    registerBuiltinCreators(registry);
  }
  return registry;
}
