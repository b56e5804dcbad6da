import path from "node:path";

import fse from "fs-extra";

import { SqlFileNotFoundError } from "./errors.js";

export interface SqlLoader {
  load(relativePath: string): Promise<string>;
}

/** Reads SQL files relative to the project root; missing files reject with SqlFileNotFoundError. */
export class FileSqlLoader implements SqlLoader {
  constructor(private readonly projectRoot: string) {}

  async load(relativePath: string): Promise<string> {
    const fullPath = path.resolve(this.projectRoot, relativePath);
    if (!(await fse.pathExists(fullPath))) {
      throw new SqlFileNotFoundError(fullPath);
    }
    return fse.readFile(fullPath, "utf8");
  }
}
