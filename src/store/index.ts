/**
 * Temporal object store and tabular I/O providers.
 */

export {
  TemporalObjectStore,
  DuplicateArtifactError,
  NotFoundError,
  sameObject,
  describeObject,
  type LogicalObject,
  type Artifact,
  type TemporalObjectStoreOptions,
} from "./temporal-store.js";
export { InMemoryTabularIO, InvalidAddressError, type TabularIO } from "./tabular-io.js";
export { FileSystemTabularIO, CorruptArtifactError } from "./fs-tabular-io.js";
export { VersionIndex } from "./version-index.js";
export { KeyedLock } from "./key-lock.js";
