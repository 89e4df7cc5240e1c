import path from "node:path";
import fg from "fast-glob";
import ignore from "ignore";

export interface DiscoverOptions {
  root: string;
  includeExtensions: string[];
  exclude: string[];
}

/**
 * Lists files under `root` whose extension is in `includeExtensions`, minus
 * `exclude` patterns. A `.gitignore` under `root` is not consulted. Paths are
 * absolute and sorted.
 */
export async function discoverFiles(options: DiscoverOptions): Promise<string[]> {
  const ig = ignore();
  ig.add(options.exclude);

  const entries = await fg(["**/*"], {
    cwd: options.root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    absolute: true
  });

  const extensions = options.includeExtensions.map((ext) => ext.toLowerCase());
  const filtered: string[] = [];
  for (const file of entries) {
    const rel = path.relative(options.root, file).split(path.sep).join("/");
    if (ig.ignores(rel)) continue;
    const ext = path.extname(file).toLowerCase();
    if (extensions.length && !extensions.includes(ext)) continue;
    filtered.push(file);
  }

  return filtered.sort();
}
