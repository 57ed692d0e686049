/**
 * Hub taxonomy and artifact addressing.
 */

export {
  HubTaxonomy,
  UnknownHubError,
  InvalidTaxonomyError,
  type HubNode,
} from "./taxonomy.js";
export {
  HubPathResolver,
  UnhostedTypeError,
  type Address,
  type AddressVariant,
} from "./resolver.js";
