import { existsSync, readdirSync, statSync, type Dirent } from "node:fs";
import { resolve } from "node:path";
import type { ILogger } from "../shared/logger.js";
import type { IVcsGateway } from "../vcs/types.js";
import {
  createRepository,
  type IRepositoryScanner,
  type Repository,
} from "./types.js";

/**
 * Finds repositories among the immediate children of a root directory.
 * Symbolic links to directories count as children. Results keep filesystem
 * enumeration order.
 */
export class RepositoryScanner implements IRepositoryScanner {
  constructor(
    private readonly gateway: Pick<IVcsGateway, "isRepository">,
    private readonly log: ILogger
  ) {}

  scan(root: string, prefix: string = ""): Repository[] {
    if (!existsSync(root)) {
      this.log.warn(`Root directory ${root} does not exist`);
      return [];
    }

    let entries: Dirent[];
    try {
      entries = readdirSync(root, { withFileTypes: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn(`Cannot list ${root}: ${message}`);
      return [];
    }

    const repositories = entries
      .filter((entry) => entry.name.startsWith(prefix) && this.isDirectory(root, entry))
      .map((entry) => resolve(root, entry.name))
      .filter((path) => this.gateway.isRepository(path))
      .map((path) => createRepository(path));

    if (repositories.length === 0) {
      const filter = prefix ? ` matching '${prefix}*'` : "";
      this.log.warn(`No repositories found in ${root}${filter}`);
    }
    return repositories;
  }

  private isDirectory(root: string, entry: Dirent): boolean {
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;

    try {
      return statSync(resolve(root, entry.name)).isDirectory();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug(`Skipping ${entry.name}: ${message}`);
      return false;
    }
  }
}
