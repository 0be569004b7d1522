import fs from 'fs-extra';
import * as path from 'node:path';

let tmpSequence = 0;

/** Writes to a sibling temp file, then renames over the target. Each write gets its own temp file. */
export async function writeJsonAtomic(file: string, value: unknown): Promise<void> {
  await fs.ensureDir(path.dirname(file));
  const tmp = `${file}.${process.pid}.${++tmpSequence}.tmp`;
  await fs.writeJson(tmp, value);
  await fs.move(tmp, file, { overwrite: true });
}

/** Parsed JSON, or undefined when the file does not exist. Parse errors propagate. */
export async function readJsonIfExists(file: string): Promise<unknown> {
  if (!(await fs.pathExists(file))) return undefined;
  const parsed: unknown = await fs.readJson(file);
  return parsed;
}
