import { readFile, stat } from "node:fs/promises";
import { extname, resolve, sep } from "node:path";

import { hasErrorCode } from "./errors";

export interface StaticFile {
  data: Buffer;
  mimeType: string;
}

export interface StaticFileResolver {
  readonly prefix: string;
  serve(path: string): Promise<StaticFile | undefined>;
}

export interface StaticFilesOptions {
  dir: string;
  prefix?: string;
}

const mimeTypes: Readonly<Record<string, string>> = {
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".js": "application/javascript",
  ".json": "application/json",
  ".txt": "text/plain",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".ico": "image/x-icon",
};

export function mimeTypeOf(file: string): string {
  const mimeType = mimeTypes[extname(file).toLowerCase()];
  return mimeType ?? "application/octet-stream";
}

export function createStaticFiles({
  dir,
  prefix = "/static/",
}: StaticFilesOptions): StaticFileResolver {
  const root = resolve(dir);
  return {
    prefix,
    async serve(path) {
      if (!path.startsWith(prefix)) return undefined;
      const relative = path.slice(prefix.length);
      if (relative === "" || relative.includes("\0")) return undefined;

      const file = resolve(root, relative);
      if (!file.startsWith(root + sep)) return undefined;

      try {
        if (!(await stat(file)).isFile()) return undefined;
        return { data: await readFile(file), mimeType: mimeTypeOf(file) };
      } catch (error: unknown) {
        if (hasErrorCode(error, "ENOENT", "ENOTDIR")) return undefined;
        throw error;
      }
    },
  };
}
