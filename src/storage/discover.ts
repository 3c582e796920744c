import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { InputPathError, errorMessage } from "../utils/errors.js";
import { log } from "../utils/logger.js";

export async function statInput(input: string): Promise<fs.Stats> {
  try {
    const stat = await fs.promises.stat(input);
    await fs.promises.access(input, fs.constants.R_OK);
    return stat;
  } catch (err) {
    const missing =
      err instanceof Error && "code" in err && err.code === "ENOENT";
    throw new InputPathError(
      input,
      missing ? "does not exist" : `is not readable (${errorMessage(err)})`
    );
  }
}

/**
 * Files to process for one run, sorted. A file input is returned as-is;
 * a directory is matched against `pattern` by base name, at any depth when
 * `recursive` is set. Paths listed in `exclude` are dropped.
 */
export async function discoverFiles(
  input: string,
  pattern: string,
  recursive: boolean,
  exclude: readonly string[] = []
): Promise<string[]> {
  const stat = await statInput(input);
  if (stat.isFile()) return [path.resolve(input)];
  if (!stat.isDirectory()) {
    throw new InputPathError(input, "is neither a file nor a directory");
  }

  const found = await fg(recursive ? `**/${pattern}` : pattern, {
    cwd: input,
    absolute: true,
    onlyFiles: true,
  });
  const skip = new Set(exclude.map((p) => path.resolve(p)));
  return found
    .map((p) => path.resolve(p))
    .filter((p) => !skip.has(p))
    .sort();
}

/** An output given as a `.csv` path means its folder. */
export function resolveOutputDir(output: string | undefined): string | undefined {
  if (output === undefined) return undefined;
  if (path.extname(output).toLowerCase() === ".csv") {
    const dir = path.dirname(output);
    log.info({ output, dir }, "output must be a folder; writing to its parent");
    return dir;
  }
  return output;
}

export function perFileTablePath(
  xmlPath: string,
  outDir: string | undefined,
  suffix: string
): string {
  const stem = path.basename(xmlPath, path.extname(xmlPath));
  return path.join(outDir ?? path.dirname(xmlPath), `${stem}${suffix}.csv`);
}
