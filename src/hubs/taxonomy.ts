/**
 * Hub taxonomy.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DATA HUBS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Artifacts are grouped into a tree of hubs by provenance or destination,
 * e.g.
 *
 *   inputs
 *   ├── sourceA
 *   └── sourceB
 *   publications
 *   └── P1
 *       └── Plans
 *
 * Each node declares the data types stored directly at it. Hosting is NOT
 * inherited: "P1" hosting "Report" says nothing about "P1/Plans", so sibling
 * and child hubs never share storage by accident.
 *
 * The taxonomy is built once from configuration and is read-only afterwards.
 */

import { EngineError } from "../errors.js";
import { HubSchema, type HubInput } from "../config/engine/schema.js";
import { EngineConfigError, formatZodIssues } from "../config/engine/loader.js";
import type { SchemaRegistry } from "../schema/index.js";

export class UnknownHubError extends EngineError {
  constructor(readonly hub: string) {
    super("UNKNOWN_HUB", `Hub "${hub}" is not declared`);
  }
}

export class InvalidTaxonomyError extends EngineError {
  constructor(message: string) {
    super("INVALID_TAXONOMY", message);
  }
}

export interface HubNode {
  readonly name: string;
  readonly parent: string | null;
  readonly hosts: ReadonlySet<string>;
  readonly description?: string;
}

export class HubTaxonomy {
  private readonly nodes: ReadonlyMap<string, HubNode>;
  private readonly paths: ReadonlyMap<string, readonly string[]>;

  private constructor(nodes: Map<string, HubNode>) {
    this.nodes = nodes;
    this.paths = HubTaxonomy.buildPaths(nodes);
  }

  /**
   * Build a taxonomy from hub declarations.
   *
   * When `schemas` is given, every hosted data type must be registered there.
   *
   * @throws EngineConfigError for malformed declarations
   * @throws InvalidTaxonomyError for duplicate names, unknown parents or cycles
   */
  static create(declarations: readonly HubInput[], schemas?: SchemaRegistry): HubTaxonomy {
    const nodes = new Map<string, HubNode>();

    for (const declaration of declarations) {
      const parsed = HubSchema.safeParse(declaration);
      if (!parsed.success) {
        throw new EngineConfigError(
          `Invalid declaration for hub "${declaration.name}"`,
          formatZodIssues(parsed.error.issues)
        );
      }
      const hub = parsed.data;
      if (nodes.has(hub.name)) {
        throw new InvalidTaxonomyError(`Hub "${hub.name}" is declared more than once`);
      }
      for (const dataType of hub.hosts) {
        // Throws UnknownTypeError for types nobody registered
        schemas?.get(dataType);
      }
      nodes.set(
        hub.name,
        Object.freeze({
          name: hub.name,
          parent: hub.parent,
          hosts: new Set(hub.hosts),
          ...(hub.description !== undefined ? { description: hub.description } : {}),
        })
      );
    }

    for (const node of nodes.values()) {
      if (node.parent !== null && !nodes.has(node.parent)) {
        throw new InvalidTaxonomyError(
          `Hub "${node.name}" names unknown parent "${node.parent}"`
        );
      }
    }

    return new HubTaxonomy(nodes);
  }

  private static buildPaths(nodes: ReadonlyMap<string, HubNode>): Map<string, readonly string[]> {
    const paths = new Map<string, readonly string[]>();

    for (const start of nodes.values()) {
      const chain: string[] = [];
      const seen = new Set<string>();
      let current: HubNode | undefined = start;
      while (current) {
        if (seen.has(current.name)) {
          throw new InvalidTaxonomyError(
            `Hub "${start.name}" is part of a parent cycle: ${[...seen].join(" -> ")}`
          );
        }
        seen.add(current.name);
        chain.unshift(current.name);
        current = current.parent === null ? undefined : nodes.get(current.parent);
      }
      paths.set(start.name, Object.freeze(chain));
    }

    return paths;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  /**
   * @throws UnknownHubError
   */
  get(name: string): HubNode {
    const node = this.nodes.get(name);
    if (!node) {
      throw new UnknownHubError(name);
    }
    return node;
  }

  /**
   * Names from the root down to `name`, inclusive.
   */
  path(name: string): readonly string[] {
    const path = this.paths.get(name);
    if (!path) {
      throw new UnknownHubError(name);
    }
    return path;
  }

  /**
   * Whether `dataType` is declared on this node itself (ancestors ignored).
   */
  hosts(name: string, dataType: string): boolean {
    return this.get(name).hosts.has(dataType);
  }

  children(name: string): HubNode[] {
    this.get(name);
    return [...this.nodes.values()]
      .filter((node) => node.parent === name)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  roots(): HubNode[] {
    return [...this.nodes.values()]
      .filter((node) => node.parent === null)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Hubs that host `dataType`, sorted by name.
   */
  hubsHosting(dataType: string): string[] {
    return [...this.nodes.values()]
      .filter((node) => node.hosts.has(dataType))
      .map((node) => node.name)
      .sort();
  }

  list(): string[] {
    return [...this.nodes.keys()].sort();
  }
}
