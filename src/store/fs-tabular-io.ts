/**
 * Filesystem-backed tabular I/O.
 *
 * Each address is a JSON file below `root`. Writes go to a temporary file in
 * the same folder and are renamed into place, so readers never observe a
 * half-written table.
 */

import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, sep } from "node:path";
import { randomBytes } from "node:crypto";

import { EngineError } from "../errors.js";
import { TableSchema, type Table } from "../table/index.js";
import type { Address } from "../hubs/index.js";
import { InvalidAddressError, type TabularIO } from "./tabular-io.js";

const TEMP_SUFFIX = ".tmp";

export class CorruptArtifactError extends EngineError {
  constructor(readonly address: Address, detail: string) {
    super("CORRUPT_ARTIFACT", `Stored artifact ${address} is unreadable: ${detail}`);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileSystemTabularIO implements TabularIO {
  constructor(readonly root: string) {}

  private pathOf(address: Address): string {
    if (address.split("/").some((segment) => segment === ".." || segment === "")) {
      throw new InvalidAddressError(address, "is not a relative path");
    }
    return join(this.root, ...address.split("/"));
  }

  async read(address: Address): Promise<Table | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathOf(address), "utf-8");
    } catch (err) {
      if (isMissing(err)) {
        return undefined;
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptArtifactError(address, err instanceof Error ? err.message : String(err));
    }
    const parsed = TableSchema.safeParse(json);
    if (!parsed.success) {
      throw new CorruptArtifactError(address, parsed.error.issues[0]?.message ?? "invalid table");
    }
    return parsed.data;
  }

  async write(address: Address, table: Table): Promise<void> {
    const target = this.pathOf(address);
    await mkdir(dirname(target), { recursive: true });
    const temp = `${target}.${randomBytes(4).toString("hex")}${TEMP_SUFFIX}`;
    await writeFile(temp, JSON.stringify({ columns: table.columns, rows: table.rows }), "utf-8");
    await rename(temp, target);
  }

  async exists(address: Address): Promise<boolean> {
    try {
      return (await stat(this.pathOf(address))).isFile();
    } catch (err) {
      if (isMissing(err)) {
        return false;
      }
      throw err;
    }
  }

  async list(prefix: Address): Promise<Address[]> {
    const folder = prefix === "" ? this.root : this.pathOf(prefix.replace(/\/$/, ""));
    let entries: string[];
    try {
      entries = await readdir(folder, { recursive: true });
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw err;
    }

    const addresses: Address[] = [];
    for (const entry of entries) {
      if (entry.endsWith(TEMP_SUFFIX)) {
        continue;
      }
      const full = join(folder, entry);
      if ((await stat(full)).isFile()) {
        addresses.push(relative(this.root, full).split(sep).join("/"));
      }
    }
    return addresses.sort();
  }

  async remove(prefix: Address): Promise<void> {
    const folder = prefix === "" ? this.root : this.pathOf(prefix.replace(/\/$/, ""));
    await rm(folder, { recursive: true, force: true });
  }
}
