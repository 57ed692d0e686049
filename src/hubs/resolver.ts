/**
 * Hub path resolver.
 *
 * Pure mapping from (hub, data type, logical id, timestamp) to the address
 * of an artifact in the blob store:
 *
 *   <hub path>/<data type>/<filename>             published artifact
 *   <hub path>/<data type>/.baseline/<filename>   machine-computed baseline
 *
 * where the filename comes from the data type's pattern. Addresses are
 * deterministic and, under one hub, injective over (data type, logical id,
 * timestamp). Whether anything is stored at an address is not checked here.
 */

import { EngineError } from "../errors.js";
import type { SchemaRegistry, ParsedFilename } from "../schema/index.js";
import { formatTimestamp, type Timestamp } from "../timestamp/index.js";
import type { HubTaxonomy } from "./taxonomy.js";

export type Address = string;

export type AddressVariant = "published" | "baseline";

const BASELINE_DIR = ".baseline";

export class UnhostedTypeError extends EngineError {
  constructor(readonly hub: string, readonly dataType: string) {
    super("UNHOSTED_TYPE", `Hub "${hub}" does not host data type "${dataType}"`);
  }
}

export class HubPathResolver {
  constructor(
    private readonly hubs: HubTaxonomy,
    private readonly schemas: SchemaRegistry
  ) {}

  /**
   * Fail unless `hub` itself declares `dataType`.
   *
   * @throws UnknownHubError, UnknownTypeError, UnhostedTypeError
   */
  assertHosted(hub: string, dataType: string): void {
    this.schemas.get(dataType);
    if (!this.hubs.hosts(hub, dataType)) {
      throw new UnhostedTypeError(hub, dataType);
    }
  }

  /**
   * Folder holding every artifact of `dataType` under `hub`.
   */
  directory(hub: string, dataType: string, variant: AddressVariant = "published"): Address {
    this.assertHosted(hub, dataType);
    const segments = [...this.hubs.path(hub), dataType];
    if (variant === "baseline") {
      segments.push(BASELINE_DIR);
    }
    return segments.join("/");
  }

  resolve(
    hub: string,
    dataType: string,
    logicalId: string,
    timestamp: Timestamp,
    variant: AddressVariant = "published"
  ): Address {
    const directory = this.directory(hub, dataType, variant);
    const { pattern } = this.schemas.get(dataType);
    const filename = pattern.render(
      logicalId,
      formatTimestamp(timestamp, this.schemas.timestampFormat)
    );
    return `${directory}/${filename}`;
  }

  /**
   * Recover (logical id, timestamp) from a published address, or null when
   * the address was not produced by `resolve` for this hub and type.
   */
  parse(hub: string, dataType: string, address: Address): ParsedFilename | null {
    const prefix = `${this.directory(hub, dataType)}/`;
    if (!address.startsWith(prefix)) {
      return null;
    }
    const filename = address.slice(prefix.length);
    if (filename.includes("/")) {
      return null;
    }
    return this.schemas.get(dataType).pattern.parse(filename);
  }
}
